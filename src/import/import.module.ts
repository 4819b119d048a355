import { Module } from '@nestjs/common';
import { ReviewsModule } from '../reviews/reviews.module';
import { ImportService } from './import.service';

@Module({
  imports: [ReviewsModule],
  providers: [ImportService],
  exports: [ImportService],
})
export class ImportModule {}
