import {
  Injectable,
  CanActivate,
  ExecutionContext,
  HttpException,
  HttpStatus,
} from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { Request } from 'express';

/**
 * Bearer-key guard for the control plane. Open when CONTROL_API_KEY is unset.
 */
@Injectable()
export class ApiKeyGuard implements CanActivate {
  constructor(private readonly configService: ConfigService) {}

  canActivate(context: ExecutionContext): boolean {
    const apiKey = this.configService.get<string>('controlApiKey');

    if (!apiKey) {
      return true;
    }

    const request = context.switchToHttp().getRequest<Request>();
    const token = this.extractBearerToken(request);

    if (token !== apiKey) {
      const maskedKey =
        token.length > 8 ? `${token.slice(0, 4)}...${token.slice(-4)}` : '****';

      throw new HttpException(
        {
          error: {
            message: `Incorrect API key provided: ${maskedKey}`,
            type: 'authentication_error',
          },
        },
        HttpStatus.UNAUTHORIZED,
      );
    }

    return true;
  }

  private extractBearerToken(request: Request): string {
    const authHeader = request.headers.authorization;

    if (!authHeader) {
      throw new HttpException(
        {
          error: {
            message:
              'Missing API key. Send it in an Authorization header using Bearer auth (Authorization: Bearer YOUR_KEY).',
            type: 'authentication_error',
          },
        },
        HttpStatus.UNAUTHORIZED,
      );
    }

    const [type, token] = authHeader.split(' ');

    if (type !== 'Bearer' || !token) {
      throw new HttpException(
        {
          error: {
            message:
              'Invalid Authorization header format. Expected: Bearer YOUR_KEY',
            type: 'authentication_error',
          },
        },
        HttpStatus.UNAUTHORIZED,
      );
    }

    return token;
  }
}
