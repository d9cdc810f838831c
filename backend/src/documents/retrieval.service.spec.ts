import { beforeEach, describe, expect, it, jest } from '@jest/globals';
import { Test } from '@nestjs/testing';
import { EmbeddingService } from '../embeddings/index.js';
import { VECTOR_INDEX } from '../vector-index/index.js';
import { InMemoryVectorIndex } from '../vector-index/testing/in-memory-vector-index.js';
import { RetrievalService } from './retrieval.service.js';

type EmbedOneFn = EmbeddingService['embedOne'];

describe('RetrievalService', () => {
  let service: RetrievalService;
  let index: InMemoryVectorIndex;
  let embedOne: jest.MockedFunction<EmbedOneFn>;

  beforeEach(async () => {
    index = new InMemoryVectorIndex();
    embedOne = jest.fn<EmbedOneFn>(async () => [1, 0]);

    const module = await Test.createTestingModule({
      providers: [
        RetrievalService,
        { provide: EmbeddingService, useValue: { embedOne } },
        { provide: VECTOR_INDEX, useValue: index },
      ],
    }).compile();

    service = module.get(RetrievalService);
  });

  it('skips embedding when the index is empty', async () => {
    await expect(service.search('anything')).resolves.toEqual([]);
    expect(embedOne).not.toHaveBeenCalled();
  });

  it('returns the single stored chunk for a larger topK', async () => {
    await index.add({
      ids: ['notes_0'],
      vectors: [[0.6, 0.8]],
      texts: ['Dentist on Friday'],
      metadatas: [{ documentId: 'notes', source: 'notes.md', chunkIndex: 0 }],
    });

    await expect(service.search('dentist', 5)).resolves.toEqual([
      {
        id: 'notes_0',
        text: 'Dentist on Friday',
        metadata: { documentId: 'notes', source: 'notes.md', chunkIndex: 0 },
      },
    ]);
    expect(embedOne).toHaveBeenCalledWith('dentist');
  });

  it('orders results by distance', async () => {
    await index.add({
      ids: ['far', 'near'],
      vectors: [
        [0, 1],
        [1, 0.1],
      ],
      texts: ['far text', 'near text'],
      metadatas: [{}, {}],
    });

    const results = await service.search('query', 2);

    expect(results.map((result) => result.id)).toEqual(['near', 'far']);
  });

  it('rejects a non-positive topK', async () => {
    await expect(service.search('query', 0)).rejects.toThrow(RangeError);
  });

  it('renders tool results with their source', async () => {
    await index.add({
      ids: ['notes_0', 'misc_0'],
      vectors: [
        [1, 0],
        [0, 1],
      ],
      texts: ['Dentist on Friday', 'Loose note'],
      metadatas: [{ source: 'notes.md' }, {}],
    });

    await expect(service.searchAsToolResult('dentist', 2)).resolves.toBe(
      '{"results":[{"content":"Dentist on Friday","source":"notes.md"},{"content":"Loose note","source":"unknown"}]}',
    );
  });
});
