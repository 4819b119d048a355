import { Module } from '@nestjs/common';
import { RatingService } from './rating.service';
import { ReviewsController } from './reviews.controller';
import { ReviewsService } from './reviews.service';

@Module({
  providers: [ReviewsService, RatingService],
  controllers: [ReviewsController],
  exports: [ReviewsService, RatingService],
})
export class ReviewsModule {}
