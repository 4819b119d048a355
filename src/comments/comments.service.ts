import { Injectable, Logger } from '@nestjs/common';
import { InjectRepository } from '@nestjs/typeorm';
import { EntityManager, Repository } from 'typeorm';
import { Actor, isOwner } from '../common/actor';
import { ForbiddenError, NotFoundError } from '../common/errors';
import { Page, PageRequest, pageWindow, toPage } from '../common/pagination';
import { UnitOfWork } from '../common/unit-of-work';
import { Comment, Review } from '../database/entities';
import { authorize, decide } from '../policy/policy';
import { assertValidText } from '../reviews/review-rules';

@Injectable()
export class CommentsService {
  private readonly logger = new Logger(CommentsService.name);

  constructor(
    private readonly unitOfWork: UnitOfWork,
    @InjectRepository(Comment)
    private readonly commentRepository: Repository<Comment>,
    @InjectRepository(Review)
    private readonly reviewRepository: Repository<Review>,
  ) {}

  async list(reviewId: number, request: PageRequest = {}): Promise<Page<Comment>> {
    if (!(await this.reviewRepository.exists({ where: { id: reviewId } }))) {
      throw new NotFoundError(`Review ${reviewId} not found`);
    }
    const window = pageWindow(request);
    const result = await this.commentRepository.findAndCount({
      where: { review: { id: reviewId } },
      relations: { author: true },
      order: { createdAt: 'ASC', id: 'ASC' },
      skip: window.skip,
      take: window.take,
    });
    return toPage(result, window, (comment) => comment);
  }

  async get(reviewId: number, commentId: number): Promise<Comment> {
    const comment = await this.commentRepository.findOne({
      where: { id: commentId, review: { id: reviewId } },
      relations: { author: true },
    });
    if (!comment) {
      throw new NotFoundError(`Comment ${commentId} not found`);
    }
    return comment;
  }

  async create(actor: Actor, reviewId: number, text: string): Promise<Comment> {
    authorize(actor, 'content:create');
    const authorId = actor.userId;
    if (authorId === null) {
      throw new ForbiddenError();
    }
    assertValidText(text);

    const commentId = await this.unitOfWork.run(async (manager) => {
      if (!(await manager.exists(Review, { where: { id: reviewId } }))) {
        throw new NotFoundError(`Review ${reviewId} not found`);
      }
      const comment = await manager.save(
        manager.create(Comment, {
          review: { id: reviewId },
          author: { id: authorId },
          text,
        }),
      );
      return comment.id;
    });

    this.logger.log(`User ${authorId} commented on review ${reviewId}`);
    return this.get(reviewId, commentId);
  }

  async update(actor: Actor, commentId: number, text: string): Promise<Comment> {
    this.assertMayModifySomething(actor);
    assertValidText(text);

    const reviewId = await this.unitOfWork.run(async (manager) => {
      const comment = await this.loadForModification(manager, actor, commentId);
      await manager.update(Comment, { id: comment.id }, { text });
      return comment.reviewId;
    });
    return this.get(reviewId, commentId);
  }

  async remove(actor: Actor, commentId: number): Promise<void> {
    this.assertMayModifySomething(actor);

    await this.unitOfWork.run(async (manager) => {
      const comment = await this.loadForModification(manager, actor, commentId);
      await manager.delete(Comment, { id: comment.id });
    });
    this.logger.log(`Deleted comment ${commentId}`);
  }

  private assertMayModifySomething(actor: Actor): void {
    if (decide(actor.role, 'content:modify', true) === 'deny') {
      throw new ForbiddenError();
    }
  }

  private async loadForModification(
    manager: EntityManager,
    actor: Actor,
    commentId: number,
  ): Promise<Comment> {
    const comment = await manager.findOne(Comment, { where: { id: commentId } });
    if (!comment) {
      throw new NotFoundError(`Comment ${commentId} not found`);
    }
    authorize(actor, 'content:modify', isOwner(actor, comment.authorId));
    return comment;
  }
}
