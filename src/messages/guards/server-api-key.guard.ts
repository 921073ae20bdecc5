import { Injectable, CanActivate, ExecutionContext, UnauthorizedException, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import type { Request } from 'express';
import { createHash, timingSafeEqual } from 'crypto';

export const SERVER_API_KEY_HEADER = 'x-server-api-key';

@Injectable()
export class ServerApiKeyGuard implements CanActivate {
  private readonly logger = new Logger(ServerApiKeyGuard.name);
  private readonly apiKey: string | undefined;

  /* v8 ignore next - false positive on constructor parameter property */
  constructor(private readonly configService: ConfigService) {
    this.apiKey = this.configService.get<string>('msgapi.main.apiKey');

    if (!this.apiKey) {
      this.logger.error('MSGAPI_API_KEY not configured - all API requests will be refused!');
    }
  }

  canActivate(context: ExecutionContext): boolean {
    const request = context.switchToHttp().getRequest<Request>();

    // Allow OPTIONS requests for CORS preflight
    if (request.method === 'OPTIONS') {
      return true;
    }

    const providedKey = this.extractApiKey(request);

    if (!providedKey) {
      this.logger.warn(`API request without credentials path=${request.path}`);
      throw new UnauthorizedException('Missing X-Server-API-Key header');
    }

    if (!this.apiKey) {
      this.logger.error('API key not configured but request received');
      throw new UnauthorizedException('API authentication not configured');
    }

    if (!this.constantTimeCompare(providedKey, this.apiKey)) {
      this.logger.warn(`API request with invalid API key path=${request.path}`);
      throw new UnauthorizedException('Invalid API key');
    }

    return true;
  }

  /**
   * Compares SHA-256 digests in constant time. Digests have a fixed length,
   * so neither the key length nor its byte encoding affects the comparison.
   */
  private constantTimeCompare(provided: string, expected: string): boolean {
    const providedDigest = createHash('sha256').update(provided, 'utf8').digest();
    const expectedDigest = createHash('sha256').update(expected, 'utf8').digest();

    return timingSafeEqual(providedDigest, expectedDigest);
  }

  private extractApiKey(request: Request): string | undefined {
    const header = request.headers[SERVER_API_KEY_HEADER];
    return Array.isArray(header) ? header[0] : header;
  }
}
