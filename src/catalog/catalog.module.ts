import { Module } from '@nestjs/common';
import { CategoriesService } from './categories.service';
import { GenresService } from './genres.service';
import { CategoriesController, GenresController } from './slug-dictionary.controller';
import { TitlesController } from './titles.controller';
import { TitlesService } from './titles.service';

@Module({
  providers: [CategoriesService, GenresService, TitlesService],
  controllers: [CategoriesController, GenresController, TitlesController],
  exports: [TitlesService],
})
export class CatalogModule {}
