import { Category } from './category.entity';
import { Comment } from './comment.entity';
import { Genre } from './genre.entity';
import { Review } from './review.entity';
import { Title } from './title.entity';
import { User } from './user.entity';

export { Category, Comment, Genre, Review, Title, User };

export const ENTITIES = [User, Category, Genre, Title, Review, Comment];
