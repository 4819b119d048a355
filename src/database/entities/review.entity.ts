import {
  Column,
  CreateDateColumn,
  Entity,
  Index,
  JoinColumn,
  ManyToOne,
  OneToMany,
  PrimaryGeneratedColumn,
  RelationId,
  Unique,
} from 'typeorm';
import { Comment } from './comment.entity';
import { Title } from './title.entity';
import { User } from './user.entity';

export const MIN_SCORE = 1;
export const MAX_SCORE = 10;

@Entity('reviews')
@Unique('uq_review_title_author', ['title', 'author'])
export class Review {
  @PrimaryGeneratedColumn()
  id!: number;

  @ManyToOne(() => Title, (title) => title.reviews, {
    nullable: false,
    onDelete: 'CASCADE',
  })
  @JoinColumn({ name: 'title_id' })
  title!: Title;

  @RelationId((review: Review) => review.title)
  titleId!: number;

  @ManyToOne(() => User, { nullable: true, onDelete: 'SET NULL' })
  @JoinColumn({ name: 'author_id' })
  author!: User | null;

  @RelationId((review: Review) => review.author)
  authorId!: number | null;

  @Column({ type: 'text' })
  text!: string;

  @Column({ type: 'smallint' })
  score!: number;

  @Index()
  @CreateDateColumn({ name: 'created_at' })
  createdAt!: Date;

  @OneToMany(() => Comment, (comment) => comment.review)
  comments!: Comment[];
}
