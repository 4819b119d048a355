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
import { Page, PaginationQueryDto } from '../common/pagination';
import { CreateReviewDto, UpdateReviewDto } from './dto/review.dto';
import { ReviewView, toReviewView } from './review.view';
import { ReviewsService } from './reviews.service';

@Controller('titles/:titleId/reviews')
export class ReviewsController {
  constructor(private readonly reviewsService: ReviewsService) {}

  @Get()
  async list(
    @Param('titleId', ParseIdPipe) titleId: number,
    @Query() query: PaginationQueryDto,
  ): Promise<Page<ReviewView>> {
    const page = await this.reviewsService.list(titleId, query);
    return { ...page, results: page.results.map(toReviewView) };
  }

  @Get(':reviewId')
  async get(
    @Param('titleId', ParseIdPipe) titleId: number,
    @Param('reviewId', ParseIdPipe) reviewId: number,
  ): Promise<ReviewView> {
    return toReviewView(await this.reviewsService.get(titleId, reviewId));
  }

  @Post()
  async create(
    @CurrentActor() actor: Actor,
    @Param('titleId', ParseIdPipe) titleId: number,
    @Body() body: CreateReviewDto,
  ): Promise<ReviewView> {
    return toReviewView(await this.reviewsService.create(actor, titleId, body));
  }

  @Patch(':reviewId')
  async update(
    @CurrentActor() actor: Actor,
    @Param('titleId', ParseIdPipe) titleId: number,
    @Param('reviewId', ParseIdPipe) reviewId: number,
    @Body() body: UpdateReviewDto,
  ): Promise<ReviewView> {
    await this.reviewsService.get(titleId, reviewId);
    return toReviewView(await this.reviewsService.update(actor, reviewId, body));
  }

  @Delete(':reviewId')
  @HttpCode(HttpStatus.NO_CONTENT)
  async remove(
    @CurrentActor() actor: Actor,
    @Param('titleId', ParseIdPipe) titleId: number,
    @Param('reviewId', ParseIdPipe) reviewId: number,
  ): Promise<void> {
    await this.reviewsService.get(titleId, reviewId);
    await this.reviewsService.remove(actor, reviewId);
  }
}
