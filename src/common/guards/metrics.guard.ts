import { Injectable, CanActivate, ExecutionContext, UnauthorizedException } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { Request } from 'express';

const DEFAULT_ALLOWED_IPS = ['127.0.0.1', '::1', '::ffff:127.0.0.1'];

/**
 * Restricts the /metrics endpoint to an IP allow-list (`METRICS_ALLOWED_IPS`).
 * Entries may be exact addresses, `*`, or an IPv4 CIDR block.
 *
 * The client address is `request.ip`, so forwarded headers only count when
 * `TRUST_PROXY` tells Express to believe them.
 */
@Injectable()
export class MetricsGuard implements CanActivate {
  private readonly allowedIps: string[];

  constructor(private configService: ConfigService) {
    const configured = this.configService.get<string>('metrics.allowedIps') ?? '';
    this.allowedIps = configured
      ? configured
          .split(',')
          .map((ip) => ip.trim())
          .filter((ip) => ip.length > 0)
      : DEFAULT_ALLOWED_IPS;
  }

  canActivate(context: ExecutionContext): boolean {
    const request = context.switchToHttp().getRequest<Request>();
    const clientIp = request.ip ?? request.socket?.remoteAddress ?? 'unknown';

    if (!this.allowedIps.some((allowedIp) => matches(allowedIp, clientIp))) {
      throw new UnauthorizedException(
        `Access denied. IP ${clientIp} not whitelisted for metrics endpoint.`,
      );
    }

    return true;
  }
}

function matches(allowedIp: string, clientIp: string): boolean {
  if (allowedIp === '*') {
    return true;
  }
  if (!allowedIp.includes('/')) {
    return clientIp === allowedIp;
  }

  const [network, bitsText] = allowedIp.split('/');
  const bits = Number(bitsText);
  const networkValue = ipv4ToNumber(network);
  const clientValue = ipv4ToNumber(clientIp.replace(/^::ffff:/, ''));
  if (networkValue === null || clientValue === null || !Number.isInteger(bits)) {
    return false;
  }
  if (bits < 0 || bits > 32) {
    return false;
  }

  const mask = bits === 0 ? 0 : (0xffffffff << (32 - bits)) >>> 0;
  return (networkValue & mask) >>> 0 === (clientValue & mask) >>> 0;
}

function ipv4ToNumber(address: string): number | null {
  const octets = address.split('.');
  if (octets.length !== 4 || !octets.every((octet) => /^\d{1,3}$/.test(octet))) {
    return null;
  }
  const values = octets.map(Number);
  if (values.some((value) => value > 255)) {
    return null;
  }
  return values.reduce((acc, value) => acc * 256 + value, 0);
}
