import { Body, Controller, HttpCode, HttpStatus, Post } from '@nestjs/common';
import { ConfirmationCodeService } from '../auth/confirmation-code.service';
import { SignupDto, TokenRequestDto } from './dto/signup.dto';
import { UsersService } from './users.service';

@Controller('auth')
export class SignupController {
  constructor(
    private readonly usersService: UsersService,
    private readonly codes: ConfirmationCodeService,
  ) {}

  @Post('signup')
  @HttpCode(HttpStatus.OK)
  async signup(@Body() body: SignupDto) {
    const user = await this.usersService.signup(body.email, body.username);
    return { email: user.email, username: user.username };
  }

  @Post('token')
  @HttpCode(HttpStatus.OK)
  async token(@Body() body: TokenRequestDto) {
    const token = await this.codes.exchange(body.username, body.confirmationCode);
    return { token };
  }
}
