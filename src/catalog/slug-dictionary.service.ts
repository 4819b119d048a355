import { Logger } from '@nestjs/common';
import { EntityManager, Repository } from 'typeorm';
import { Actor } from '../common/actor';
import { ConflictError, NotFoundError } from '../common/errors';
import { Page, PageRequest, pageWindow, toPage } from '../common/pagination';
import { UnitOfWork } from '../common/unit-of-work';
import { authorize } from '../policy/policy';
import { assertValidName, assertValidSlug } from './catalog-rules';

export interface SlugEntry {
  id: number;
  name: string;
  slug: string;
}

export interface SlugEntryInput {
  name: string;
  slug: string;
}

export interface DictionaryQuery extends PageRequest {
  search?: string;
}

/**
 * Shared CRUD for the name/slug dictionaries titles are classified by.
 * Subclasses decide what happens to titles when an entry is deleted.
 */
export abstract class SlugDictionaryService<E extends SlugEntry> {
  protected abstract readonly logger: Logger;
  protected abstract readonly label: string;

  constructor(
    protected readonly unitOfWork: UnitOfWork,
    protected readonly repository: Repository<E>,
  ) {}

  protected abstract build(input: SlugEntryInput): E;

  /** Runs in the deleting transaction, before the entry itself goes. */
  protected abstract detachFromTitles(manager: EntityManager, entry: E): Promise<void>;

  async list(query: DictionaryQuery = {}): Promise<Page<E>> {
    const window = pageWindow(query);
    const builder = this.repository
      .createQueryBuilder('entry')
      .orderBy('entry.name', 'ASC')
      .skip(window.skip)
      .take(window.take);
    if (query.search) {
      builder.where('LOWER(entry.name) LIKE :search', {
        search: `%${query.search.toLowerCase()}%`,
      });
    }
    return toPage(await builder.getManyAndCount(), window, (entry) => entry);
  }

  async get(slug: string): Promise<E> {
    const entry = await this.findBySlug(this.repository, slug);
    if (!entry) {
      throw new NotFoundError(`${this.label} ${slug} not found`);
    }
    return entry;
  }

  async create(actor: Actor, input: SlugEntryInput): Promise<E> {
    authorize(actor, 'catalog:write');
    assertValidName(input.name);
    assertValidSlug(input.slug);

    const entry = await this.unitOfWork.run(async (manager) => {
      const repository = manager.withRepository(this.repository);
      await this.assertUnique(repository, input);
      return repository.save(this.build(input));
    });
    this.logger.log(`Created ${this.label.toLowerCase()} ${entry.slug}`);
    return entry;
  }

  async update(actor: Actor, slug: string, changes: Partial<SlugEntryInput>): Promise<E> {
    authorize(actor, 'catalog:write');
    if (changes.name !== undefined) assertValidName(changes.name);
    if (changes.slug !== undefined) assertValidSlug(changes.slug);

    return this.unitOfWork.run(async (manager) => {
      const repository = manager.withRepository(this.repository);
      const entry = await this.findBySlug(repository, slug);
      if (!entry) {
        throw new NotFoundError(`${this.label} ${slug} not found`);
      }
      const next = { name: changes.name ?? entry.name, slug: changes.slug ?? entry.slug };
      await this.assertUnique(repository, next, entry.id);
      return repository.save(Object.assign(entry, next));
    });
  }

  async remove(actor: Actor, slug: string): Promise<void> {
    authorize(actor, 'catalog:write');

    await this.unitOfWork.run(async (manager) => {
      const repository = manager.withRepository(this.repository);
      const entry = await this.findBySlug(repository, slug);
      if (!entry) {
        throw new NotFoundError(`${this.label} ${slug} not found`);
      }
      await this.detachFromTitles(manager, entry);
      await repository.remove(entry);
    });
    this.logger.log(`Deleted ${this.label.toLowerCase()} ${slug}`);
  }

  private findBySlug(repository: Repository<E>, slug: string): Promise<E | null> {
    return repository
      .createQueryBuilder('entry')
      .where('entry.slug = :slug', { slug })
      .getOne();
  }

  private async assertUnique(
    repository: Repository<E>,
    input: SlugEntryInput,
    exceptId?: number,
  ): Promise<void> {
    const builder = repository
      .createQueryBuilder('entry')
      .where('(entry.name = :name OR entry.slug = :slug)', {
        name: input.name,
        slug: input.slug,
      });
    if (exceptId !== undefined) {
      builder.andWhere('entry.id != :exceptId', { exceptId });
    }
    if ((await builder.getCount()) > 0) {
      throw new ConflictError(
        `A ${this.label.toLowerCase()} with this name or slug already exists`,
      );
    }
  }
}
