import {
  CanActivate,
  createParamDecorator,
  ExecutionContext,
  Injectable,
} from '@nestjs/common';
import type { Request } from 'express';
import { Actor, ANONYMOUS } from '../common/actor';
import { UnauthenticatedError } from '../common/errors';
import { TokenService } from './token.service';

export interface ActorRequest extends Request {
  actor?: Actor;
}

/**
 * Resolves the request's actor from the Authorization header. No header means
 * anonymous; a header that does not verify is rejected before any handler runs.
 */
@Injectable()
export class ActorGuard implements CanActivate {
  constructor(private readonly tokens: TokenService) {}

  async canActivate(context: ExecutionContext): Promise<boolean> {
    const request = context.switchToHttp().getRequest<ActorRequest>();
    request.actor = await this.resolve(request.headers.authorization);
    return true;
  }

  private async resolve(header: string | undefined): Promise<Actor> {
    if (!header) {
      return ANONYMOUS;
    }
    const [scheme, token] = header.split(' ');
    if (scheme !== 'Bearer' || !token) {
      throw new UnauthenticatedError('Expected a Bearer token');
    }
    return this.tokens.verify(token);
  }
}

export const CurrentActor = createParamDecorator(
  (_data: unknown, context: ExecutionContext): Actor =>
    context.switchToHttp().getRequest<ActorRequest>().actor ?? ANONYMOUS,
);
