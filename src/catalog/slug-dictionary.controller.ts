import {
  Body,
  Controller,
  Delete,
  Get,
  HttpCode,
  HttpStatus,
  Param,
  Patch,
  Post,
  Query,
} from '@nestjs/common';
import { CurrentActor } from '../auth/actor.guard';
import { Actor } from '../common/actor';
import { Page } from '../common/pagination';
import { Category, Genre } from '../database/entities';
import { toSlugEntryView, SlugEntryView } from './catalog.view';
import { CategoriesService } from './categories.service';
import { CreateSlugEntryDto, SearchQueryDto, UpdateSlugEntryDto } from './dto/catalog.dto';
import { GenresService } from './genres.service';
import { SlugDictionaryService, SlugEntry } from './slug-dictionary.service';

abstract class SlugDictionaryController<E extends SlugEntry> {
  constructor(private readonly service: SlugDictionaryService<E>) {}

  @Get()
  async list(@Query() query: SearchQueryDto): Promise<Page<SlugEntryView>> {
    const page = await this.service.list(query);
    return { ...page, results: page.results.map(toSlugEntryView) };
  }

  @Get(':slug')
  async get(@Param('slug') slug: string): Promise<SlugEntryView> {
    return toSlugEntryView(await this.service.get(slug));
  }

  @Post()
  async create(
    @CurrentActor() actor: Actor,
    @Body() body: CreateSlugEntryDto,
  ): Promise<SlugEntryView> {
    return toSlugEntryView(await this.service.create(actor, body));
  }

  @Patch(':slug')
  async update(
    @CurrentActor() actor: Actor,
    @Param('slug') slug: string,
    @Body() body: UpdateSlugEntryDto,
  ): Promise<SlugEntryView> {
    return toSlugEntryView(await this.service.update(actor, slug, body));
  }

  @Delete(':slug')
  @HttpCode(HttpStatus.NO_CONTENT)
  async remove(
    @CurrentActor() actor: Actor,
    @Param('slug') slug: string,
  ): Promise<void> {
    await this.service.remove(actor, slug);
  }
}

@Controller('categories')
export class CategoriesController extends SlugDictionaryController<Category> {
  constructor(service: CategoriesService) {
    super(service);
  }
}

@Controller('genres')
export class GenresController extends SlugDictionaryController<Genre> {
  constructor(service: GenresService) {
    super(service);
  }
}
