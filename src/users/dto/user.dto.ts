import {
  IsEmail,
  IsIn,
  IsOptional,
  IsString,
  Matches,
  MaxLength,
  NotEquals,
} from 'class-validator';
import { PaginationQueryDto } from '../../common/pagination';
import {
  EMAIL_MAX_LENGTH,
  USERNAME_MAX_LENGTH,
} from '../../database/entities/user.entity';
import { STORED_ROLES, StoredRole } from '../../policy/roles';
import { RESERVED_USERNAME, USERNAME_PATTERN } from '../identity-rules';

export class ProfileDto {
  @IsOptional()
  @IsString()
  @MaxLength(150)
  firstName?: string;

  @IsOptional()
  @IsString()
  @MaxLength(150)
  lastName?: string;

  @IsOptional()
  @IsString()
  bio?: string;
}

export class CreateUserDto extends ProfileDto {
  @IsEmail()
  @MaxLength(EMAIL_MAX_LENGTH)
  email!: string;

  @IsString()
  @MaxLength(USERNAME_MAX_LENGTH)
  @Matches(USERNAME_PATTERN)
  @NotEquals(RESERVED_USERNAME)
  username!: string;

  @IsOptional()
  @IsIn(STORED_ROLES)
  role?: StoredRole;
}

export class UpdateUserDto extends ProfileDto {
  @IsOptional()
  @IsEmail()
  @MaxLength(EMAIL_MAX_LENGTH)
  email?: string;

  @IsOptional()
  @IsString()
  @MaxLength(USERNAME_MAX_LENGTH)
  @Matches(USERNAME_PATTERN)
  @NotEquals(RESERVED_USERNAME)
  username?: string;

  @IsOptional()
  @IsIn(STORED_ROLES)
  role?: StoredRole;
}

export class ListUsersQueryDto extends PaginationQueryDto {
  @IsOptional()
  @IsString()
  search?: string;
}

export class SetRoleDto {
  @IsIn(STORED_ROLES)
  role!: StoredRole;
}
