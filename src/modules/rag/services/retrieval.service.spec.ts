// modules/rag/services/retrieval.service.spec.ts
import { Test, TestingModule } from '@nestjs/testing';
import { RetrievalService } from './retrieval.service';
import { VectorDbService } from '../../vectordb/vectordb.service';
import { EMBEDDER } from '../../embedding/interfaces/embedder.interface';
import { DocumentRecord, SimilarityMatch } from '../../vectordb/interfaces/vector/vector.interface';
import { createConfigServiceMock } from '../../../common/testing/config-service.mock';
import { NO_CONTEXT_SENTINEL } from '../../../common/constants/context.constants';

const makeRecord = (fileName: string, content: string): DocumentRecord => ({
  filePath: `/docs/${fileName}`,
  fileName,
  fileSize: content.length,
  fileExtension: '.txt',
  lastModified: '2024-01-01T00:00:00.000Z',
  relativePath: fileName,
  sha256: `hash-${fileName}`,
  content,
});

const VECTORS: Record<string, number[]> = {
  alpha: [1, 0, 0, 0],
  beta: [0, 1, 0, 0],
  'alpha beta': [1, 1, 0, 0],
  gamma: [0, 0, 1, 0],
  'empty.txt': [0, 0, 0, 1],
  '   ': [0, 0, 1, 1],
  short: [1, 0],
};

describe('RetrievalService', () => {
  let service: RetrievalService;
  let vectorDb: VectorDbService;
  let embed: jest.Mock<Promise<number[]>, [string]>;

  beforeEach(async () => {
    embed = jest.fn(async (text: string) => {
      const vector = VECTORS[text];
      if (!vector) throw new Error(`no vector for ${text}`);
      return vector;
    });

    const module: TestingModule = await Test.createTestingModule({
      providers: [
        RetrievalService,
        VectorDbService,
        { provide: EMBEDDER, useValue: { dimension: 4, embed } },
        createConfigServiceMock({ 'embedding.dimension': 4, 'rag.topK': 3 }),
      ],
    }).compile();

    service = module.get<RetrievalService>(RetrievalService);
    vectorDb = module.get<VectorDbService>(VectorDbService);
  });

  const corpus = [
    makeRecord('a.txt', 'alpha'),
    makeRecord('b.txt', 'beta'),
    makeRecord('ab.txt', 'alpha beta'),
    makeRecord('g.txt', 'gamma'),
  ];

  describe('initialize', () => {
    it('should index every record and report stats', async () => {
      await expect(service.initialize(corpus)).resolves.toBe(true);

      const stats = service.getStats();
      expect(stats.initialized).toBe(true);
      expect(stats.documentCount).toBe(4);
      expect(stats.embeddingDimension).toBe(4);
      expect(typeof stats.lastUpdated).toBe('string');
    });

    it('should stay uninitialized for an empty corpus', async () => {
      await expect(service.initialize([])).resolves.toBe(false);
      expect(service.getStats()).toEqual({
        initialized: false,
        documentCount: 0,
        embeddingDimension: 0,
        lastUpdated: null,
      });
    });

    it('should embed the file name when the content is empty', async () => {
      await service.initialize([makeRecord('empty.txt', '')]);

      expect(embed).toHaveBeenCalledWith('empty.txt');
      expect(vectorDb.getDocuments()[0].embeddedText).toBe('empty.txt');
    });

    it('should embed whitespace-only content as it is', async () => {
      await service.initialize([makeRecord('spaces.txt', '   ')]);

      expect(embed).toHaveBeenCalledWith('   ');
      expect(vectorDb.getDocuments()[0].embeddedText).toBe('   ');
    });

    it('should skip documents that fail to embed or have the wrong dimension', async () => {
      const ok = await service.initialize([
        makeRecord('a.txt', 'alpha'),
        makeRecord('x.txt', 'unknown text'),
        makeRecord('s.txt', 'short'),
      ]);

      expect(ok).toBe(true);
      expect(vectorDb.getDocuments().map((doc) => doc.record.fileName)).toEqual(['a.txt']);
    });

    it('should be uninitialized when no document could be embedded', async () => {
      await expect(service.initialize([makeRecord('x.txt', 'unknown text')])).resolves.toBe(false);
      expect(service.isInitialized()).toBe(false);
    });

    it('should replace the previous corpus on reinitialization', async () => {
      await service.initialize(corpus);
      await service.initialize([makeRecord('g.txt', 'gamma')]);

      expect(vectorDb.size()).toBe(1);
      expect(vectorDb.getDocuments()[0].record.fileName).toBe('g.txt');
    });

    it('should assign a unique id to each indexed document', async () => {
      await service.initialize(corpus);
      const ids = vectorDb.getDocuments().map((doc) => doc.id);
      expect(new Set(ids).size).toBe(4);
    });
  });

  describe('retrieve', () => {
    it('should return nothing before initialization without embedding the query', async () => {
      await expect(service.retrieve('alpha')).resolves.toEqual([]);
      expect(embed).not.toHaveBeenCalled();
    });

    it('should rank by similarity and apply the configured top-k', async () => {
      await service.initialize(corpus);

      const matches = await service.retrieve('alpha');

      expect(matches.map((m) => m.document.record.fileName)).toEqual(['a.txt', 'ab.txt', 'b.txt']);
      expect(matches[0].score).toBeCloseTo(1, 10);
      expect(matches[1].score).toBeCloseTo(Math.SQRT1_2, 10);
      expect(matches[2].score).toBe(0);
    });

    it('should honor an explicit top-k', async () => {
      await service.initialize(corpus);
      await expect(service.retrieve('gamma', 1)).resolves.toHaveLength(1);
    });
  });

  describe('formatContext', () => {
    it('should render the sentinel for no matches', () => {
      expect(service.formatContext([])).toBe(NO_CONTEXT_SENTINEL);
    });

    it('should render numbered documents separated by a delimiter', async () => {
      await service.initialize(corpus);
      const matches = await service.retrieve('alpha', 2);

      expect(service.formatContext(matches)).toBe(
        'Document 1 (similarity: 1.000):\nSource: a.txt\nContent: alpha\n' +
          '\n---\n' +
          'Document 2 (similarity: 0.707):\nSource: ab.txt\nContent: alpha beta\n',
      );
    });

    it('should truncate long content to 500 characters', async () => {
      await service.initialize(corpus);
      const [match] = await service.retrieve('alpha', 1);
      const long: SimilarityMatch = {
        score: match.score,
        document: { ...match.document, embeddedText: 'x'.repeat(600) },
      };

      expect(service.formatContext([long])).toBe(
        `Document 1 (similarity: 1.000):\nSource: a.txt\nContent: ${'x'.repeat(500)}...\n`,
      );
    });
  });
});
