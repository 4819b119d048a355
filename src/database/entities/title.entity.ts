import {
  Column,
  Entity,
  Index,
  JoinColumn,
  JoinTable,
  ManyToMany,
  ManyToOne,
  OneToMany,
  PrimaryGeneratedColumn,
  RelationId,
} from 'typeorm';
import { Category, NAME_MAX_LENGTH } from './category.entity';
import { Genre } from './genre.entity';
import { Review } from './review.entity';

@Entity('titles')
export class Title {
  @PrimaryGeneratedColumn()
  id!: number;

  @Index()
  @Column({ type: 'varchar', length: NAME_MAX_LENGTH })
  name!: string;

  @Column({ type: 'int' })
  year!: number;

  @Column({ type: 'text', nullable: true })
  description!: string | null;

  @ManyToOne(() => Category, { nullable: true, onDelete: 'SET NULL' })
  @JoinColumn({ name: 'category_id' })
  category!: Category | null;

  @RelationId((title: Title) => title.category)
  categoryId!: number | null;

  @ManyToMany(() => Genre)
  @JoinTable({
    name: 'title_genres',
    joinColumn: { name: 'title_id', referencedColumnName: 'id' },
    inverseJoinColumn: { name: 'genre_id', referencedColumnName: 'id' },
  })
  genres!: Genre[];

  // average review score, maintained by RatingService; null without reviews
  @Column({ type: 'double precision', nullable: true })
  rating!: number | null;

  @OneToMany(() => Review, (review) => review.title)
  reviews!: Review[];
}
