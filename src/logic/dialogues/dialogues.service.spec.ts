import { Test, TestingModule } from '@nestjs/testing';
import { getRepositoryToken } from '@nestjs/typeorm';
import { Dialogue } from '../../entities';
import { DialoguesService, RetrievalError, clampSimilarity, toVectorLiteral } from './dialogues.service';

describe('DialoguesService', () => {
  let service: DialoguesService;
  const query = jest.fn();
  const count = jest.fn();

  beforeEach(async () => {
    query.mockReset();
    count.mockReset();
    const module: TestingModule = await Test.createTestingModule({
      providers: [
        DialoguesService,
        { provide: getRepositoryToken(Dialogue), useValue: { query, count } },
      ],
    }).compile();

    service = module.get<DialoguesService>(DialoguesService);
  });

  describe('search', () => {
    it('sends the vector literal and limit as parameters', async () => {
      query.mockResolvedValue([]);

      await service.search([0.5, -0.25], 3);

      const [sql, params] = query.mock.calls[0];
      expect(sql).toContain('1 - (embedding <=> $1::vector) AS similarity');
      expect(sql).toContain('LIMIT $2');
      expect(params).toEqual(['[0.5,-0.25]', 3]);
    });

    it('maps rows to search results', async () => {
      query.mockResolvedValue([
        { id: '7', dialogue_id: 'D-007', content: 'Le client signale une panne.', similarity: 0.92 },
      ]);

      await expect(service.search([1, 0], 1)).resolves.toEqual([
        { recordId: 7, dialogueId: 'D-007', content: 'Le client signale une panne.', similarity: 0.92 },
      ]);
    });

    it('orders by similarity descending, then record id ascending', async () => {
      query.mockResolvedValue([
        { id: 4, dialogue_id: 'b', content: 'B', similarity: 0.5 },
        { id: 2, dialogue_id: 'a', content: 'A', similarity: 0.9 },
        { id: 1, dialogue_id: 'c', content: 'C', similarity: 0.5 },
      ]);

      const results = await service.search([1, 0], 5);

      expect(results.map(r => r.recordId)).toEqual([2, 1, 4]);
    });

    it('keeps similarity within [0, 1] and never returns more than topK', async () => {
      query.mockResolvedValue([
        { id: 1, dialogue_id: 'a', content: 'A', similarity: 1.0000001 },
        { id: 2, dialogue_id: 'b', content: 'B', similarity: -0.3 },
        { id: 3, dialogue_id: 'c', content: 'C', similarity: 0.1 },
      ]);

      const results = await service.search([1, 0], 2);

      expect(results).toHaveLength(2);
      expect(results.map(r => r.similarity)).toEqual([1, 0.1]);
    });

    it('rejects a non-positive topK before querying', async () => {
      await expect(service.search([1, 0], 0)).rejects.toThrow(RangeError);
      await expect(service.search([1, 0], 2.5)).rejects.toThrow(RangeError);
      expect(query).not.toHaveBeenCalled();
    });

    it('wraps query failures in a RetrievalError', async () => {
      const cause = new Error('connection terminated');
      query.mockRejectedValue(cause);

      const error = await service.search([1, 0], 3).catch((e: unknown) => e);
      expect(error).toBeInstanceOf(RetrievalError);
      expect(error).toHaveProperty('message', 'Dialogue search failed: connection terminated');
      expect(error).toHaveProperty('cause', cause);
    });
  });

  describe('count', () => {
    it('returns the number of indexed dialogues', async () => {
      count.mockResolvedValue(42);

      await expect(service.count()).resolves.toBe(42);
    });

    it('returns null instead of failing', async () => {
      count.mockRejectedValue(new Error('relation "dialogues" does not exist'));

      await expect(service.count()).resolves.toBeNull();
    });
  });
});

describe('toVectorLiteral', () => {
  it('formats a pgvector literal', () => {
    expect(toVectorLiteral([1, 0.5, -2])).toBe('[1,0.5,-2]');
  });
});

describe('clampSimilarity', () => {
  it('maps non-finite values to 0', () => {
    expect(clampSimilarity(Number.NaN)).toBe(0);
  });
});
