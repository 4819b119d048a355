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
import { ReviewsService } from '../reviews/reviews.service';
import { CommentView, toCommentView } from './comment.view';
import { CommentsService } from './comments.service';
import { CommentDto } from './dto/comment.dto';

@Controller('titles/:titleId/reviews/:reviewId/comments')
export class CommentsController {
  constructor(
    private readonly commentsService: CommentsService,
    private readonly reviewsService: ReviewsService,
  ) {}

  @Get()
  async list(
    @Param('titleId', ParseIdPipe) titleId: number,
    @Param('reviewId', ParseIdPipe) reviewId: number,
    @Query() query: PaginationQueryDto,
  ): Promise<Page<CommentView>> {
    await this.reviewsService.get(titleId, reviewId);
    const page = await this.commentsService.list(reviewId, query);
    return { ...page, results: page.results.map(toCommentView) };
  }

  @Get(':commentId')
  async get(
    @Param('titleId', ParseIdPipe) titleId: number,
    @Param('reviewId', ParseIdPipe) reviewId: number,
    @Param('commentId', ParseIdPipe) commentId: number,
  ): Promise<CommentView> {
    await this.reviewsService.get(titleId, reviewId);
    return toCommentView(await this.commentsService.get(reviewId, commentId));
  }

  @Post()
  async create(
    @CurrentActor() actor: Actor,
    @Param('titleId', ParseIdPipe) titleId: number,
    @Param('reviewId', ParseIdPipe) reviewId: number,
    @Body() body: CommentDto,
  ): Promise<CommentView> {
    await this.reviewsService.get(titleId, reviewId);
    return toCommentView(await this.commentsService.create(actor, reviewId, body.text));
  }

  @Patch(':commentId')
  async update(
    @CurrentActor() actor: Actor,
    @Param('titleId', ParseIdPipe) titleId: number,
    @Param('reviewId', ParseIdPipe) reviewId: number,
    @Param('commentId', ParseIdPipe) commentId: number,
    @Body() body: CommentDto,
  ): Promise<CommentView> {
    await this.reviewsService.get(titleId, reviewId);
    await this.commentsService.get(reviewId, commentId);
    return toCommentView(await this.commentsService.update(actor, commentId, body.text));
  }

  @Delete(':commentId')
  @HttpCode(HttpStatus.NO_CONTENT)
  async remove(
    @CurrentActor() actor: Actor,
    @Param('titleId', ParseIdPipe) titleId: number,
    @Param('reviewId', ParseIdPipe) reviewId: number,
    @Param('commentId', ParseIdPipe) commentId: number,
  ): Promise<void> {
    await this.reviewsService.get(titleId, reviewId);
    await this.commentsService.get(reviewId, commentId);
    await this.commentsService.remove(actor, commentId);
  }
}
