import { Inject, Injectable, Logger } from '@nestjs/common';
import { APP_CONFIG, AppConfig } from '../config/configuration';

/**
 * Out-of-band channel for confirmation codes. Delivery is best effort: the
 * caller logs a failure and carries on.
 */
export abstract class CodeDeliveryChannel {
  abstract deliver(email: string, code: string): Promise<void>;
}

/** Writes the message to the application log instead of sending mail. */
@Injectable()
export class LoggingCodeDelivery extends CodeDeliveryChannel {
  private readonly logger = new Logger('Mail');

  constructor(@Inject(APP_CONFIG) private readonly config: AppConfig) {
    super();
  }

  async deliver(email: string, code: string): Promise<void> {
    this.logger.log(
      `From: ${this.config.mail.from} To: ${email} Subject: Confirmation code | Your confirmation code: ${code}`,
    );
  }
}
