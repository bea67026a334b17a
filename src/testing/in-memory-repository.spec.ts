import { IsNull, LessThan, MoreThan } from 'typeorm';
import { InMemoryEntityManager } from './in-memory-repository';
import { RefreshToken } from '../auth/refresh-token/entities/refresh-token.entity';

describe('InMemoryRepository', () => {
  const now = new Date('2030-01-01T00:00:00.000Z');

  async function seeded() {
    const db = new InMemoryEntityManager();
    const repository = db.getRepository(RefreshToken);
    await repository.save(
      repository.create({
        id: 'token-1',
        userId: 'user-1',
        tokenHash: 'hash-1',
        expiresAt: new Date(now.getTime() + 60_000),
        revokedAt: null,
        replacedBy: null,
        ipAddress: null,
        userAgent: null,
      }),
    );
    return repository;
  }

  it('returns stored dates as Date instances that compare with find operators', async () => {
    const repository = await seeded();

    const [stored] = repository.all();
    expect(stored.expiresAt).toBeInstanceOf(Date);
    expect(stored.createdAt).toBeInstanceOf(Date);
    await expect(repository.countBy({ expiresAt: MoreThan(now) })).resolves.toBe(1);
    await expect(repository.countBy({ expiresAt: LessThan(now) })).resolves.toBe(0);
  });

  it('applies a conditional update exactly once', async () => {
    const repository = await seeded();
    const where = { id: 'token-1', revokedAt: IsNull(), expiresAt: MoreThan(now) };

    await expect(repository.update(where, { revokedAt: now })).resolves.toEqual({ affected: 1 });
    await expect(repository.update(where, { revokedAt: now })).resolves.toEqual({ affected: 0 });
    expect(repository.all()[0].revokedAt).toEqual(now);
    expect(repository.all()[0].revokedAt).toBeInstanceOf(Date);
  });

  it('hands out copies that do not write through to storage', async () => {
    const repository = await seeded();

    const [copy] = repository.all();
    copy.expiresAt.setTime(0);

    await expect(repository.countBy({ expiresAt: MoreThan(now) })).resolves.toBe(1);
  });
});
