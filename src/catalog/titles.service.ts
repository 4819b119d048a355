import { Injectable, Logger } from '@nestjs/common';
import { InjectRepository } from '@nestjs/typeorm';
import { EntityManager, In, Repository } from 'typeorm';
import { Actor } from '../common/actor';
import { NotFoundError, ValidationError } from '../common/errors';
import { KeyedLock, titleLockKey } from '../common/keyed-lock';
import { Page, PageRequest, pageWindow, toPage } from '../common/pagination';
import { UnitOfWork } from '../common/unit-of-work';
import { Category, Comment, Genre, Review, Title } from '../database/entities';
import { lockTitle } from '../database/locking';
import { authorize } from '../policy/policy';
import { assertValidName, assertValidYear } from './catalog-rules';

export interface TitleInput {
  name: string;
  year: number;
  description?: string | null;
  /** category slug; null or omitted leaves the title uncategorized */
  category?: string | null;
  /** genre slugs, at least one */
  genres: string[];
}

export type TitleChanges = Partial<TitleInput>;

export interface TitleQuery extends PageRequest {
  category?: string;
  genre?: string;
  name?: string;
  year?: number;
}

@Injectable()
export class TitlesService {
  private readonly logger = new Logger(TitlesService.name);

  constructor(
    private readonly unitOfWork: UnitOfWork,
    private readonly lock: KeyedLock,
    @InjectRepository(Title)
    private readonly titleRepository: Repository<Title>,
  ) {}

  /**
   * Category, genre and name filters match case-insensitive fragments
   * (slugs for category and genre); year matches exactly.
   */
  async list(query: TitleQuery = {}): Promise<Page<Title>> {
    const window = pageWindow(query);
    const builder = this.titleRepository
      .createQueryBuilder('title')
      .leftJoinAndSelect('title.category', 'category')
      .leftJoinAndSelect('title.genres', 'genre')
      .orderBy('title.name', 'ASC')
      .addOrderBy('title.id', 'ASC')
      .skip(window.skip)
      .take(window.take);

    if (query.category) {
      builder.andWhere('LOWER(category.slug) LIKE :category', {
        category: `%${query.category.toLowerCase()}%`,
      });
    }
    if (query.genre) {
      builder.andWhere(
        `title.id IN (
          SELECT tg.title_id FROM title_genres tg
          INNER JOIN genres g ON g.id = tg.genre_id
          WHERE LOWER(g.slug) LIKE :genre
        )`,
        { genre: `%${query.genre.toLowerCase()}%` },
      );
    }
    if (query.name) {
      builder.andWhere('LOWER(title.name) LIKE :name', {
        name: `%${query.name.toLowerCase()}%`,
      });
    }
    if (query.year !== undefined) {
      builder.andWhere('title.year = :year', { year: query.year });
    }

    return toPage(await builder.getManyAndCount(), window, (title) => title);
  }

  async get(titleId: number): Promise<Title> {
    const title = await this.titleRepository.findOne({
      where: { id: titleId },
      relations: { category: true, genres: true },
    });
    if (!title) {
      throw new NotFoundError(`Title ${titleId} not found`);
    }
    return title;
  }

  async create(actor: Actor, input: TitleInput): Promise<Title> {
    authorize(actor, 'catalog:write');
    assertValidName(input.name);
    assertValidYear(input.year);

    const titleId = await this.unitOfWork.run(async (manager) => {
      const title = manager.create(Title, {
        name: input.name,
        year: input.year,
        description: input.description ?? null,
        category: await this.resolveCategory(manager, input.category),
        genres: await this.resolveGenres(manager, input.genres),
        rating: null,
      });
      return (await manager.save(title)).id;
    });

    this.logger.log(`Created title ${titleId} (${input.name})`);
    return this.get(titleId);
  }

  /** Rating is not accepted here; it only ever follows the review set. */
  async update(actor: Actor, titleId: number, changes: TitleChanges): Promise<Title> {
    authorize(actor, 'catalog:write');
    if (changes.name !== undefined) assertValidName(changes.name);
    if (changes.year !== undefined) assertValidYear(changes.year);

    await this.unitOfWork.run(async (manager) => {
      const title = await manager.findOne(Title, {
        where: { id: titleId },
        relations: { category: true, genres: true },
      });
      if (!title) {
        throw new NotFoundError(`Title ${titleId} not found`);
      }
      if (changes.name !== undefined) title.name = changes.name;
      if (changes.year !== undefined) title.year = changes.year;
      if (changes.description !== undefined) title.description = changes.description;
      if (changes.category !== undefined) {
        title.category = await this.resolveCategory(manager, changes.category);
      }
      if (changes.genres !== undefined) {
        title.genres = await this.resolveGenres(manager, changes.genres);
      }
      await manager.save(title);
    });

    return this.get(titleId);
  }

  /**
   * Deletes the title with its reviews and their comments. Holds the title's
   * lock so no review mutation recomputes a rating for a vanishing title.
   */
  async remove(actor: Actor, titleId: number): Promise<void> {
    authorize(actor, 'catalog:write');

    await this.lock.run(titleLockKey(titleId), () =>
      this.unitOfWork.run(async (manager) => {
        const title = await lockTitle(manager, titleId);
        if (!title) {
          throw new NotFoundError(`Title ${titleId} not found`);
        }
        await manager
          .createQueryBuilder()
          .delete()
          .from(Comment)
          .where('review_id IN (SELECT id FROM reviews WHERE title_id = :titleId)', {
            titleId,
          })
          .execute();
        await manager
          .createQueryBuilder()
          .delete()
          .from(Review)
          .where('title_id = :titleId', { titleId })
          .execute();
        await manager
          .createQueryBuilder()
          .delete()
          .from('title_genres')
          .where('title_id = :titleId', { titleId })
          .execute();
        await manager.delete(Title, { id: titleId });
      }),
    );

    this.logger.log(`Deleted title ${titleId}`);
  }

  private async resolveCategory(
    manager: EntityManager,
    slug: string | null | undefined,
  ): Promise<Category | null> {
    if (slug === null || slug === undefined) {
      return null;
    }
    const category = await manager.findOne(Category, { where: { slug } });
    if (!category) {
      throw new ValidationError(`Unknown category "${slug}"`);
    }
    return category;
  }

  private async resolveGenres(manager: EntityManager, slugs: string[]): Promise<Genre[]> {
    const wanted = [...new Set(slugs)];
    if (wanted.length === 0) {
      throw new ValidationError('A title needs at least one genre');
    }
    const genres = await manager.find(Genre, { where: { slug: In(wanted) } });
    const missing = wanted.filter((slug) => !genres.some((genre) => genre.slug === slug));
    if (missing.length > 0) {
      throw new ValidationError(`Unknown genre(s): ${missing.join(', ')}`);
    }
    return genres;
  }
}
