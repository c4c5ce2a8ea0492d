import {
  chatModelNames,
  fallbackModels,
  parseModelListing,
  pickDefaultModel,
  selectModelName,
} from './model-discovery';

describe('parseModelListing', () => {
  it('should accept a bare list of names', () => {
    expect(parseModelListing(['gpt-4o', 'text-embedding-3-small'])).toEqual([
      { name: 'gpt-4o', capability: 'chat', raw: 'gpt-4o' },
      { name: 'text-embedding-3-small', capability: 'embedding', raw: 'text-embedding-3-small' },
    ]);
  });

  it.each(['models', 'data', 'items'])('should unwrap a list under "%s"', (key) => {
    const models = parseModelListing({ [key]: [{ id: 'gpt-4o-mini' }] });
    expect(models?.map((m) => m.name)).toEqual(['gpt-4o-mini']);
  });

  it('should read the first available name field', () => {
    const models = parseModelListing([
      { modelName: 'claude-sonnet' },
      { model_name: 'llama-3' },
      { identifier: 'mistral-large' },
      { modelId: 'gemini-pro' },
      { description: 'no name here' },
    ]);
    expect(models?.map((m) => m.name)).toEqual([
      'claude-sonnet',
      'llama-3',
      'mistral-large',
      'gemini-pro',
    ]);
  });

  it('should honour a declared embedding type', () => {
    const models = parseModelListing([{ name: 'custom-embedder', type: 'Embedding' }]);
    expect(models?.[0].capability).toBe('embedding');
  });

  it('should treat a single model object as a one-item list', () => {
    expect(parseModelListing({ name: 'gpt-4.1' })?.map((m) => m.name)).toEqual(['gpt-4.1']);
  });

  it('should reject unrecognised shapes', () => {
    expect(parseModelListing({ status: 'ok' })).toBeNull();
    expect(parseModelListing('gpt-4o')).toBeNull();
    expect(parseModelListing(undefined)).toBeNull();
  });

  it('should accept an empty list', () => {
    expect(parseModelListing({ data: [] })).toEqual([]);
  });
});

describe('fallbackModels', () => {
  it('should expose the known chat models in preference order', () => {
    expect(chatModelNames(fallbackModels())).toEqual(['gpt-4o', 'gpt-4o-mini', 'gpt-4.1']);
  });

  it('should tag embedding models', () => {
    const embedding = fallbackModels().filter((m) => m.capability === 'embedding');
    expect(embedding.map((m) => m.name)).toEqual([
      'text-embedding-ada-002',
      'text-embedding-3-small',
      'text-embedding-3-large',
    ]);
  });
});

describe('selectModelName', () => {
  const discovered = ['gpt-4o', 'gpt-4o-mini'];

  it('should prefer an exact match', () => {
    expect(selectModelName(discovered, 'gpt-4o')).toEqual({ name: 'gpt-4o', rule: 'exact' });
    expect(selectModelName(discovered, 'gpt-4o-mini')).toEqual({
      name: 'gpt-4o-mini',
      rule: 'exact',
    });
  });

  it('should fall back to the most specific case-insensitive partial match', () => {
    expect(selectModelName(discovered, 'GPT-4O-MINI-X')).toEqual({
      name: 'gpt-4o-mini',
      rule: 'partial',
    });
  });

  it('should pick the closest name containing the request', () => {
    expect(selectModelName(discovered, 'GPT-4')).toEqual({ name: 'gpt-4o', rule: 'partial' });
  });

  it('should prefer a name contained in the request over one containing it', () => {
    expect(selectModelName(['gpt-4o', 'gpt-4o-mini-high'], 'gpt-4o-mini')).toEqual({
      name: 'gpt-4o',
      rule: 'partial',
    });
  });

  it('should match when the candidate contains the request', () => {
    expect(selectModelName(['claude-3-opus', 'gpt-4o'], 'OPUS')).toEqual({
      name: 'claude-3-opus',
      rule: 'partial',
    });
  });

  it('should use the preference order when nothing is requested', () => {
    expect(selectModelName(discovered)).toEqual({ name: 'gpt-4o', rule: 'preferred' });
    expect(selectModelName(['gpt-4.1', 'gpt-4o-mini'], '')).toEqual({
      name: 'gpt-4o-mini',
      rule: 'preferred',
    });
  });

  it('should use the preference order for unknown requests', () => {
    expect(selectModelName(discovered, 'unknown')).toEqual({ name: 'gpt-4o', rule: 'preferred' });
  });

  it('should use the first discovered model when no preferred model exists', () => {
    expect(selectModelName(['llama-3', 'mistral'], 'unknown')).toEqual({
      name: 'llama-3',
      rule: 'first-available',
    });
  });

  it('should use the hardcoded default when nothing was discovered', () => {
    expect(selectModelName([], 'anything')).toEqual({ name: 'gpt-4o', rule: 'default' });
    expect(pickDefaultModel([])).toEqual({ name: 'gpt-4o', rule: 'default' });
  });
});
