import { Module } from '@nestjs/common';
import { APP_GUARD } from '@nestjs/core';
import { JwtModule } from '@nestjs/jwt';
import { APP_CONFIG, AppConfig } from '../config/configuration';
import { ActorGuard } from './actor.guard';
import { CodeDeliveryChannel, LoggingCodeDelivery } from './code-delivery';
import { ConfirmationCodeService } from './confirmation-code.service';
import { TokenService } from './token.service';

@Module({
  imports: [
    JwtModule.registerAsync({
      inject: [APP_CONFIG],
      useFactory: (config: AppConfig) => ({
        secret: config.auth.jwtSecret,
        signOptions: { expiresIn: config.auth.jwtExpiresIn },
      }),
    }),
  ],
  providers: [
    TokenService,
    ConfirmationCodeService,
    { provide: CodeDeliveryChannel, useClass: LoggingCodeDelivery },
    { provide: APP_GUARD, useClass: ActorGuard },
  ],
  exports: [TokenService, ConfirmationCodeService, CodeDeliveryChannel],
})
export class AuthModule {}
