import { Comment } from '../database/entities';

export interface CommentView {
  id: number;
  text: string;
  author: string | null;
  createdAt: string;
}

export function toCommentView(comment: Comment): CommentView {
  return {
    id: comment.id,
    text: comment.text,
    author: comment.author?.username ?? null,
    createdAt: comment.createdAt.toISOString(),
  };
}
