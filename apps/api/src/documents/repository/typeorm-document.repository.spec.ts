import { Test } from '@nestjs/testing';
import { getRepositoryToken } from '@nestjs/typeorm';
import { Document, DocumentStatus } from '@papertrail/database';
import { RepositoryUnavailableException } from './repository.exceptions';
import { TypeOrmDocumentRepository } from './typeorm-document.repository';

const DOCUMENT_ID = '3f2e1d0c-9b8a-4765-8432-10fedcba9876';

/** Records the UPDATE a query builder chain would run. */
class FakeUpdateQuery {
  values: Record<string, unknown> = {};
  readonly conditions: string[] = [];
  readonly parameters: Record<string, unknown> = {};

  constructor(private readonly affected: number) {}

  update(): this {
    return this;
  }

  set(values: Record<string, unknown>): this {
    this.values = values;
    return this;
  }

  where(condition: string, parameters: Record<string, unknown> = {}): this {
    return this.andWhere(condition, parameters);
  }

  andWhere(condition: string, parameters: Record<string, unknown> = {}): this {
    this.conditions.push(condition);
    Object.assign(this.parameters, parameters);
    return this;
  }

  async execute(): Promise<{ affected: number; raw: unknown[] }> {
    return { affected: this.affected, raw: [] };
  }
}

function processingDocument(): Document {
  return Object.assign(new Document(), {
    id: DOCUMENT_ID,
    fileName: 'notes.txt',
    contentType: 'text/plain',
    sizeBytes: '16',
    storageLocator: `documents/${DOCUMENT_ID}/notes.txt`,
    status: DocumentStatus.PROCESSING,
    extractedText: 'Plain text body.',
    summary: null,
    summaryMetadata: null,
    errorCode: null,
    errorMessage: null,
    attemptCount: 1,
    isDeleted: false,
    createdAt: new Date('2026-01-05T10:00:00.000Z'),
    updatedAt: new Date('2026-01-05T10:00:01.000Z'),
  });
}

describe('TypeOrmDocumentRepository', () => {
  let query: FakeUpdateQuery;
  let ormRepository: {
    createQueryBuilder: jest.Mock;
    findOne: jest.Mock;
    findOneBy: jest.Mock;
  };
  let repository: TypeOrmDocumentRepository;

  async function createRepository(affected: number): Promise<void> {
    query = new FakeUpdateQuery(affected);
    ormRepository = {
      createQueryBuilder: jest.fn(() => query),
      findOne: jest.fn().mockResolvedValue(null),
      findOneBy: jest.fn().mockResolvedValue(processingDocument()),
    };
    const moduleRef = await Test.createTestingModule({
      providers: [
        TypeOrmDocumentRepository,
        { provide: getRepositoryToken(Document), useValue: ormRepository },
      ],
    }).compile();
    repository = moduleRef.get(TypeOrmDocumentRepository);
  }

  describe('saveTransition', () => {
    it('writes only lifecycle columns of an active row in the expected status', async () => {
      await createRepository(1);
      const document = processingDocument();
      document.status = DocumentStatus.FAILED;
      document.errorCode = 'RATE_LIMITED';
      document.errorMessage = 'Rate limited by remote model: quota exceeded';

      const saved = await repository.saveTransition(
        document,
        DocumentStatus.PROCESSING,
      );

      expect(saved).toBe(document);
      expect(query.values).toEqual({
        status: DocumentStatus.FAILED,
        extractedText: 'Plain text body.',
        summary: null,
        summaryMetadata: null,
        errorCode: 'RATE_LIMITED',
        errorMessage: 'Rate limited by remote model: quota exceeded',
        attemptCount: 1,
        updatedAt: new Date('2026-01-05T10:00:01.000Z'),
      });
      expect(query.conditions).toEqual([
        'id = :id',
        'status = :expected',
        'is_deleted = false',
      ]);
      expect(query.parameters).toEqual({
        id: DOCUMENT_ID,
        expected: DocumentStatus.PROCESSING,
      });
    });

    it('returns null when the row was deleted or moved on', async () => {
      await createRepository(0);

      await expect(
        repository.saveTransition(processingDocument(), DocumentStatus.PROCESSING),
      ).resolves.toBeNull();
    });

    it('wraps driver errors', async () => {
      await createRepository(1);
      jest
        .spyOn(query, 'execute')
        .mockRejectedValueOnce(new Error('connection terminated'));

      await expect(
        repository.saveTransition(processingDocument(), DocumentStatus.PROCESSING),
      ).rejects.toBeInstanceOf(RepositoryUnavailableException);
    });
  });

  describe('claim', () => {
    it('returns the claimed row even if it was deleted right after', async () => {
      await createRepository(1);

      const claimed = await repository.claim(DOCUMENT_ID, [DocumentStatus.PENDING]);

      expect(claimed?.id).toBe(DOCUMENT_ID);
      expect(ormRepository.findOneBy).toHaveBeenCalledWith({ id: DOCUMENT_ID });
      expect(ormRepository.findOne).not.toHaveBeenCalled();
      expect(query.values).toMatchObject({
        status: DocumentStatus.PROCESSING,
        extractedText: null,
        attemptCount: expect.any(Function),
      });
      expect(query.parameters).toEqual({
        id: DOCUMENT_ID,
        from: [DocumentStatus.PENDING],
      });
    });

    it('returns null when the conditional update matches nothing', async () => {
      await createRepository(0);

      await expect(
        repository.claim(DOCUMENT_ID, [DocumentStatus.FAILED, DocumentStatus.PROCESSED]),
      ).resolves.toBeNull();
      expect(ormRepository.findOneBy).not.toHaveBeenCalled();
    });
  });
});
