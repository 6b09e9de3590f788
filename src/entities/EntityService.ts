import {
  EntityNotFoundError,
  EntityStorageError,
  type FilterValidationError,
} from './errors.js';
import { buildEntityFilter } from './filter/FilterBuilder.js';
import type { IEntityRepository } from './IEntityRepository.js';
import {
  err,
  ok,
  type Entity,
  type EntityInput,
  type ListEntitiesQuery,
  type Result,
} from './types.js';

/**
 * Entry point for every entity operation.
 *
 * Filter validation happens here, before the repository is touched, so an
 * invalid parameter never produces a query. Failures come back as result
 * values; the HTTP layer maps them to status codes.
 */
export class EntityService {
  private repository: IEntityRepository;

  constructor(repository: IEntityRepository) {
    this.repository = repository;
  }

  async createEntity(input: EntityInput): Promise<Result<Entity, EntityStorageError>> {
    return this.attempt(() => this.repository.createEntity(input));
  }

  async getEntity(id: number): Promise<Result<Entity, EntityNotFoundError | EntityStorageError>> {
    const found = await this.attempt(() => this.repository.getEntity(id));
    if (!found.ok) {
      return found;
    }
    return found.value ? ok(found.value) : err(new EntityNotFoundError(id));
  }

  async listEntities(
    query: ListEntitiesQuery
  ): Promise<Result<Entity[], FilterValidationError | EntityStorageError>> {
    const filter = buildEntityFilter(query);
    if (!filter.ok) {
      return filter;
    }

    return this.attempt(() =>
      this.repository.listEntities(filter.value, { skip: query.skip, limit: query.limit })
    );
  }

  async updateEntity(
    id: number,
    input: EntityInput
  ): Promise<Result<Entity, EntityNotFoundError | EntityStorageError>> {
    const updated = await this.attempt(() => this.repository.updateEntity(id, input));
    if (!updated.ok) {
      return updated;
    }
    return updated.value ? ok(updated.value) : err(new EntityNotFoundError(id));
  }

  async deleteEntity(id: number): Promise<Result<true, EntityNotFoundError | EntityStorageError>> {
    const deleted = await this.attempt(() => this.repository.deleteEntity(id));
    if (!deleted.ok) {
      return deleted;
    }
    return deleted.value ? ok<true>(true) : err(new EntityNotFoundError(id));
  }

  async checkHealth(): Promise<Result<true, EntityStorageError>> {
    const pinged = await this.attempt(() => this.repository.ping());
    return pinged.ok ? ok<true>(true) : pinged;
  }

  /**
   * Run a repository call, turning a thrown storage failure into a result.
   * Anything that is not a storage failure is a programming error and propagates.
   */
  private async attempt<T>(fn: () => Promise<T>): Promise<Result<T, EntityStorageError>> {
    try {
      return ok(await fn());
    } catch (error) {
      if (error instanceof EntityStorageError) {
        return err(error);
      }
      throw error;
    }
  }
}
