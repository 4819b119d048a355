import { ValidationError } from '../common/errors';
import { MAX_SCORE, MIN_SCORE } from '../database/entities/review.entity';

export function assertValidScore(score: number): void {
  if (!Number.isInteger(score) || score < MIN_SCORE || score > MAX_SCORE) {
    throw new ValidationError(
      `Score must be a whole number from ${MIN_SCORE} to ${MAX_SCORE}`,
    );
  }
}

export function assertValidText(text: string): void {
  if (text.trim().length === 0) {
    throw new ValidationError('Text must not be blank');
  }
}
