import { User } from '../database/entities';

export interface UserView {
  username: string;
  email: string;
  firstName: string;
  lastName: string;
  bio: string;
  role: string;
}

export function toUserView(user: User): UserView {
  return {
    username: user.username,
    email: user.email,
    firstName: user.firstName,
    lastName: user.lastName,
    bio: user.bio,
    role: user.role,
  };
}
