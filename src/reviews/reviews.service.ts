import { Injectable, Logger } from '@nestjs/common';
import { InjectRepository } from '@nestjs/typeorm';
import { EntityManager, Repository } from 'typeorm';
import { Actor, isOwner } from '../common/actor';
import {
  ConflictError,
  ForbiddenError,
  NotFoundError,
  ValidationError,
} from '../common/errors';
import { KeyedLock, titleLockKey } from '../common/keyed-lock';
import { Page, PageRequest, pageWindow, toPage } from '../common/pagination';
import { UnitOfWork } from '../common/unit-of-work';
import { Comment, Review, Title } from '../database/entities';
import { lockTitle } from '../database/locking';
import { authorize, decide } from '../policy/policy';
import { RatingService } from './rating.service';
import { assertValidScore, assertValidText } from './review-rules';

export interface ReviewInput {
  text: string;
  score: number;
}

export type ReviewChanges = Partial<ReviewInput>;

/**
 * The review ledger. A (title, author) pair has either no review or exactly
 * one; every change to a title's reviews re-derives its rating in the same
 * transaction, under that title's lock.
 */
@Injectable()
export class ReviewsService {
  private readonly logger = new Logger(ReviewsService.name);

  constructor(
    private readonly unitOfWork: UnitOfWork,
    private readonly lock: KeyedLock,
    private readonly rating: RatingService,
    @InjectRepository(Review)
    private readonly reviewRepository: Repository<Review>,
    @InjectRepository(Title)
    private readonly titleRepository: Repository<Title>,
  ) {}

  async list(titleId: number, request: PageRequest = {}): Promise<Page<Review>> {
    if (!(await this.titleRepository.exists({ where: { id: titleId } }))) {
      throw new NotFoundError(`Title ${titleId} not found`);
    }
    const window = pageWindow(request);
    const result = await this.reviewRepository.findAndCount({
      where: { title: { id: titleId } },
      relations: { author: true },
      order: { createdAt: 'ASC', id: 'ASC' },
      skip: window.skip,
      take: window.take,
    });
    return toPage(result, window, (review) => review);
  }

  async get(titleId: number, reviewId: number): Promise<Review> {
    const review = await this.reviewRepository.findOne({
      where: { id: reviewId, title: { id: titleId } },
      relations: { author: true },
    });
    if (!review) {
      throw new NotFoundError(`Review ${reviewId} not found`);
    }
    return review;
  }

  async create(actor: Actor, titleId: number, input: ReviewInput): Promise<Review> {
    authorize(actor, 'content:create');
    const authorId = actor.userId;
    if (authorId === null) {
      throw new ForbiddenError();
    }
    assertValidText(input.text);
    assertValidScore(input.score);

    const reviewId = await this.lock.run(titleLockKey(titleId), () =>
      this.unitOfWork.run(async (manager) => {
        if (!(await lockTitle(manager, titleId))) {
          throw new ValidationError(`Title ${titleId} does not exist`);
        }
        const existing = await manager.count(Review, {
          where: { title: { id: titleId }, author: { id: authorId } },
        });
        if (existing > 0) {
          throw new ConflictError('You have already reviewed this title');
        }

        const review = await manager.save(
          manager.create(Review, {
            title: { id: titleId },
            author: { id: authorId },
            text: input.text,
            score: input.score,
          }),
        );
        await this.rating.recompute(manager, titleId);
        return review.id;
      }),
    );

    this.logger.log(`User ${authorId} reviewed title ${titleId} (review ${reviewId})`);
    return this.get(titleId, reviewId);
  }

  async update(actor: Actor, reviewId: number, changes: ReviewChanges): Promise<Review> {
    this.assertMayModifySomething(actor);
    if (changes.text !== undefined) assertValidText(changes.text);
    if (changes.score !== undefined) assertValidScore(changes.score);

    const titleId = await this.titleOf(reviewId);
    await this.lock.run(titleLockKey(titleId), () =>
      this.unitOfWork.run(async (manager) => {
        await lockTitle(manager, titleId);
        const review = await this.loadForModification(manager, actor, reviewId);

        const patch: ReviewChanges = {};
        if (changes.text !== undefined) patch.text = changes.text;
        if (changes.score !== undefined) patch.score = changes.score;
        if (Object.keys(patch).length > 0) {
          await manager.update(Review, { id: review.id }, patch);
        }
        await this.rating.recompute(manager, titleId);
      }),
    );

    return this.get(titleId, reviewId);
  }

  /** Deletes the review and its comments, then re-derives the rating. */
  async remove(actor: Actor, reviewId: number): Promise<void> {
    this.assertMayModifySomething(actor);

    const titleId = await this.titleOf(reviewId);
    await this.lock.run(titleLockKey(titleId), () =>
      this.unitOfWork.run(async (manager) => {
        await lockTitle(manager, titleId);
        const review = await this.loadForModification(manager, actor, reviewId);

        await manager
          .createQueryBuilder()
          .delete()
          .from(Comment)
          .where('review_id = :reviewId', { reviewId: review.id })
          .execute();
        await manager.delete(Review, { id: review.id });
        await this.rating.recompute(manager, titleId);
      }),
    );

    this.logger.log(`Deleted review ${reviewId} of title ${titleId}`);
  }

  // a role that cannot modify even its own content is refused before any lookup
  private assertMayModifySomething(actor: Actor): void {
    if (decide(actor.role, 'content:modify', true) === 'deny') {
      throw new ForbiddenError();
    }
  }

  private async titleOf(reviewId: number): Promise<number> {
    const review = await this.reviewRepository.findOne({ where: { id: reviewId } });
    if (!review) {
      throw new NotFoundError(`Review ${reviewId} not found`);
    }
    return review.titleId;
  }

  private async loadForModification(
    manager: EntityManager,
    actor: Actor,
    reviewId: number,
  ): Promise<Review> {
    const review = await manager.findOne(Review, { where: { id: reviewId } });
    if (!review) {
      throw new NotFoundError(`Review ${reviewId} not found`);
    }
    authorize(actor, 'content:modify', isOwner(actor, review.authorId));
    return review;
  }
}
