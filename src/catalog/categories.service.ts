import { Injectable, Logger } from '@nestjs/common';
import { InjectRepository } from '@nestjs/typeorm';
import { EntityManager, Repository } from 'typeorm';
import { UnitOfWork } from '../common/unit-of-work';
import { Category, Title } from '../database/entities';
import { SlugDictionaryService, SlugEntryInput } from './slug-dictionary.service';

@Injectable()
export class CategoriesService extends SlugDictionaryService<Category> {
  protected readonly logger = new Logger(CategoriesService.name);
  protected readonly label = 'Category';

  constructor(
    unitOfWork: UnitOfWork,
    @InjectRepository(Category) repository: Repository<Category>,
  ) {
    super(unitOfWork, repository);
  }

  protected build(input: SlugEntryInput): Category {
    return Object.assign(new Category(), input);
  }

  // titles survive without a category
  protected async detachFromTitles(manager: EntityManager, entry: Category): Promise<void> {
    await manager
      .createQueryBuilder()
      .update(Title)
      .set({ category: null })
      .where('category_id = :categoryId', { categoryId: entry.id })
      .execute();
  }
}
