import type { DataSource, EntityTarget, ObjectLiteral } from 'typeorm';
import type { QueryDeepPartialEntity } from 'typeorm/query-builder/QueryPartialEntity';

/**
 * UPDATE ... WHERE id = :id AND version = :version.
 *
 * The query builder bumps the version column and refreshes updated_at on its
 * own. Resolves to false when no row matched, i.e. someone else wrote first.
 */
export async function updateIfVersion<E extends ObjectLiteral>(
    dataSource: DataSource,
    target: EntityTarget<E>,
    id: number,
    version: number,
    values: QueryDeepPartialEntity<E>
): Promise<boolean> {
    const result = await dataSource
        .createQueryBuilder()
        .update(target)
        .set(values)
        .where('id = :id AND version = :version', { id, version })
        .execute();
    return result.affected !== 0;
}
