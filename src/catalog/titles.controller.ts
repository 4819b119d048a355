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
import { ParseIdPipe } from '../common/parse-id.pipe';
import { Page } from '../common/pagination';
import { toTitleView, TitleView } from './catalog.view';
import { CreateTitleDto, TitleQueryDto, UpdateTitleDto } from './dto/catalog.dto';
import { TitlesService } from './titles.service';

@Controller('titles')
export class TitlesController {
  constructor(private readonly titlesService: TitlesService) {}

  @Get()
  async list(@Query() query: TitleQueryDto): Promise<Page<TitleView>> {
    const page = await this.titlesService.list(query);
    return { ...page, results: page.results.map(toTitleView) };
  }

  @Get(':titleId')
  async get(@Param('titleId', ParseIdPipe) titleId: number): Promise<TitleView> {
    return toTitleView(await this.titlesService.get(titleId));
  }

  @Post()
  async create(
    @CurrentActor() actor: Actor,
    @Body() body: CreateTitleDto,
  ): Promise<TitleView> {
    return toTitleView(await this.titlesService.create(actor, body));
  }

  @Patch(':titleId')
  async update(
    @CurrentActor() actor: Actor,
    @Param('titleId', ParseIdPipe) titleId: number,
    @Body() body: UpdateTitleDto,
  ): Promise<TitleView> {
    return toTitleView(await this.titlesService.update(actor, titleId, body));
  }

  @Delete(':titleId')
  @HttpCode(HttpStatus.NO_CONTENT)
  async remove(
    @CurrentActor() actor: Actor,
    @Param('titleId', ParseIdPipe) titleId: number,
  ): Promise<void> {
    await this.titlesService.remove(actor, titleId);
  }
}
