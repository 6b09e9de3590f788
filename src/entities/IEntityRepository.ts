import type { FilterPredicate } from './filter/FilterPredicate.js';
import type { Entity, EntityInput, PageWindow } from './types.js';

/**
 * Backend-neutral storage contract for entities.
 *
 * Implementations own connection handling and transactions. Missing rows are
 * reported as `null`/`false`; any other failure is thrown as an
 * `EntityStorageError`.
 *
 * @example
 * ```typescript
 * const repo: IEntityRepository = new EntityRepositoryPostgres(pool);
 * const created = await repo.createEntity({ createdBy: 'alice', data: { a: 1 } });
 * const page = await repo.listEntities(
 *   { type: 'keyExists', key: 'a' },
 *   { skip: 0, limit: 10 }
 * );
 * ```
 */
export interface IEntityRepository {
  createEntity(input: EntityInput): Promise<Entity>;

  getEntity(id: number): Promise<Entity | null>;

  /**
   * Entities matching `predicate`, in storage order, windowed by `skip`/`limit`.
   */
  listEntities(predicate: FilterPredicate, window: PageWindow): Promise<Entity[]>;

  /**
   * Replace `createdBy` and `data`. `id` and `createdAt` are untouched.
   * @returns the updated entity, or `null` when no row has this id
   */
  updateEntity(id: number, input: EntityInput): Promise<Entity | null>;

  /**
   * Hard delete.
   * @returns `false` when no row has this id
   */
  deleteEntity(id: number): Promise<boolean>;

  /** Run a trivial query; rejects when storage is unreachable. */
  ping(): Promise<void>;

  close(): Promise<void>;
}
