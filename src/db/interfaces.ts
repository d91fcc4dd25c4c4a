import { FindManyOptions, FindOneOptions, FindOptionsWhere, ObjectLiteral, UpdateResult } from "typeorm";
import { QueryDeepPartialEntity } from "typeorm/query-builder/QueryPartialEntity";

/**
 * Database Interfaces
 *
 * The slice of TypeORM the services use, so tests can hand in plain mocks.
 */

export interface IRepository<T extends ObjectLiteral> {
    findOne(options: FindOneOptions<T>): Promise<T | null>;
    find(options?: FindManyOptions<T>): Promise<T[]>;
    update(criteria: FindOptionsWhere<T>, partialEntity: QueryDeepPartialEntity<T>): Promise<UpdateResult>;
}
