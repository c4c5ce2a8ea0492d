// modules/llm/model-discovery.ts
import { isRecord } from '../../common/utils/json.util';
import { ModelCapability, ModelDescriptor } from './interfaces/gateway.interface';

export const DEFAULT_MODEL = 'gpt-4o';

// Most capable general chat models first
export const PREFERRED_MODELS: readonly string[] = ['gpt-4o', 'gpt-4o-mini', 'gpt-4.1'];

const KNOWN_MODELS: readonly string[] = [
  'gpt-4o',
  'gpt-4o-mini',
  'gpt-4.1',
  'text-embedding-ada-002',
  'text-embedding-3-small',
  'text-embedding-3-large',
];

const LIST_WRAPPER_KEYS = ['models', 'data', 'items'] as const;
const NAME_KEYS = ['name', 'id', 'model', 'modelName', 'model_name', 'identifier', 'modelId'] as const;

export type SelectionRule = 'exact' | 'partial' | 'preferred' | 'first-available' | 'default';

export interface ModelSelection {
  name: string;
  rule: SelectionRule;
}

const capabilityOf = (name: string, declared?: unknown): ModelCapability => {
  if (typeof declared === 'string' && declared.toLowerCase().includes('embed')) return 'embedding';
  return name.startsWith('text-embedding') ? 'embedding' : 'chat';
};

const modelNameOf = (entry: Record<string, unknown>): string | undefined => {
  for (const key of NAME_KEYS) {
    const value = entry[key];
    if (typeof value === 'string' && value.trim().length > 0) return value.trim();
  }
  return undefined;
};

export function describeModel(entry: unknown): ModelDescriptor | null {
  if (typeof entry === 'string') {
    const name = entry.trim();
    return name ? { name, capability: capabilityOf(name), raw: entry } : null;
  }
  if (!isRecord(entry)) return null;

  const name = modelNameOf(entry);
  if (!name) return null;
  return { name, capability: capabilityOf(name, entry.type ?? entry.capability), raw: entry };
}

/**
 * Accepts a bare list, a list wrapped under models/data/items, or a single
 * model object. Returns null for anything else.
 */
export function parseModelListing(payload: unknown): ModelDescriptor[] | null {
  let entries: unknown[] | null = null;

  if (Array.isArray(payload)) {
    entries = payload;
  } else if (isRecord(payload)) {
    for (const key of LIST_WRAPPER_KEYS) {
      const wrapped = payload[key];
      if (Array.isArray(wrapped)) {
        entries = wrapped;
        break;
      }
    }
    if (!entries && modelNameOf(payload)) entries = [payload];
  }

  if (!entries) return null;

  const models: ModelDescriptor[] = [];
  for (const entry of entries) {
    const model = describeModel(entry);
    if (model) models.push(model);
  }
  return models;
}

export function fallbackModels(): ModelDescriptor[] {
  return KNOWN_MODELS.map((name) => {
    const capability = capabilityOf(name);
    return { name, capability, raw: { name, id: name, type: capability } };
  });
}

export function chatModelNames(models: readonly ModelDescriptor[]): string[] {
  return models.filter((model) => model.capability === 'chat').map((model) => model.name);
}

export function pickDefaultModel(available: readonly string[]): ModelSelection {
  const preferred = PREFERRED_MODELS.find((name) => available.includes(name));
  if (preferred) return { name: preferred, rule: 'preferred' };
  if (available.length > 0) return { name: available[0], rule: 'first-available' };
  return { name: DEFAULT_MODEL, rule: 'default' };
}

/**
 * Exact match, then case-insensitive substring match, then the default chain.
 * A name contained in the request beats one containing it; among names
 * contained in the request the longest wins, among names containing it the shortest.
 */
export function selectModelName(available: readonly string[], requested?: string): ModelSelection {
  if (requested) {
    if (available.includes(requested)) return { name: requested, rule: 'exact' };

    const wanted = requested.toLowerCase();
    let contained: string | undefined;
    let containing: string | undefined;
    for (const name of available) {
      const candidate = name.toLowerCase();
      if (wanted.includes(candidate)) {
        if (contained === undefined || name.length > contained.length) contained = name;
      } else if (candidate.includes(wanted)) {
        if (containing === undefined || name.length < containing.length) containing = name;
      }
    }
    const partial = contained ?? containing;
    if (partial) return { name: partial, rule: 'partial' };
  }

  return pickDefaultModel(available);
}
