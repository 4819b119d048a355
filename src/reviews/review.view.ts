import { Review } from '../database/entities';

export interface ReviewView {
  id: number;
  text: string;
  author: string | null;
  score: number;
  createdAt: string;
}

export function toReviewView(review: Review): ReviewView {
  return {
    id: review.id,
    text: review.text,
    author: review.author?.username ?? null,
    score: review.score,
    createdAt: review.createdAt.toISOString(),
  };
}
