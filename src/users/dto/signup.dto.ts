import { IsEmail, IsString, Matches, MaxLength, NotEquals } from 'class-validator';
import {
  EMAIL_MAX_LENGTH,
  USERNAME_MAX_LENGTH,
} from '../../database/entities/user.entity';
import { RESERVED_USERNAME, USERNAME_PATTERN } from '../identity-rules';

export class SignupDto {
  @IsEmail()
  @MaxLength(EMAIL_MAX_LENGTH)
  email!: string;

  @IsString()
  @MaxLength(USERNAME_MAX_LENGTH)
  @Matches(USERNAME_PATTERN)
  @NotEquals(RESERVED_USERNAME)
  username!: string;
}

export class TokenRequestDto {
  @IsString()
  @MaxLength(USERNAME_MAX_LENGTH)
  username!: string;

  @IsString()
  confirmationCode!: string;
}
