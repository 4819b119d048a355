import { Injectable } from '@nestjs/common';
import { EntityManager } from 'typeorm';
import { Review, Title } from '../database/entities';

/** Rounds half-up to one decimal place, the precision ratings are shown at. */
export function roundRating(average: number): number {
  return Math.round((average + Number.EPSILON) * 10) / 10;
}

@Injectable()
export class RatingService {
  /**
   * Re-derives the title's rating from its current review set and stores it.
   * Must run inside the transaction that changed the reviews, after the
   * title has been locked.
   */
  async recompute(manager: EntityManager, titleId: number): Promise<number | null> {
    const row = await manager
      .getRepository(Review)
      .createQueryBuilder('review')
      .select('AVG(review.score)', 'average')
      .where('review.title_id = :titleId', { titleId })
      .getRawOne<{ average: string | number | null }>();

    // postgres returns AVG as a numeric string
    const average =
      row === undefined || row.average === null ? null : Number(row.average);
    const rating = average === null ? null : roundRating(average);

    await manager.update(Title, { id: titleId }, { rating });
    return rating;
  }
}
