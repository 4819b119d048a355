import { EntityManager } from 'typeorm';
import { Title } from './entities';

/**
 * Loads a title inside the current transaction. On PostgreSQL the row is
 * locked FOR UPDATE so review mutations on the same title queue behind each
 * other until commit; SQLite already serializes writers.
 */
export async function lockTitle(
  manager: EntityManager,
  titleId: number,
): Promise<Title | null> {
  const query = manager
    .getRepository(Title)
    .createQueryBuilder('title')
    .where('title.id = :titleId', { titleId });

  if (manager.connection.options.type === 'postgres') {
    query.setLock('pessimistic_write');
  }

  return query.getOne();
}
