import { Injectable, Logger } from '@nestjs/common';
import { InjectRepository } from '@nestjs/typeorm';
import { EntityManager, Repository } from 'typeorm';
import { UnitOfWork } from '../common/unit-of-work';
import { Genre } from '../database/entities';
import { SlugDictionaryService, SlugEntryInput } from './slug-dictionary.service';

@Injectable()
export class GenresService extends SlugDictionaryService<Genre> {
  protected readonly logger = new Logger(GenresService.name);
  protected readonly label = 'Genre';

  constructor(
    unitOfWork: UnitOfWork,
    @InjectRepository(Genre) repository: Repository<Genre>,
  ) {
    super(unitOfWork, repository);
  }

  protected build(input: SlugEntryInput): Genre {
    return Object.assign(new Genre(), input);
  }

  protected async detachFromTitles(manager: EntityManager, entry: Genre): Promise<void> {
    await manager
      .createQueryBuilder()
      .delete()
      .from('title_genres')
      .where('genre_id = :genreId', { genreId: entry.id })
      .execute();
  }
}
