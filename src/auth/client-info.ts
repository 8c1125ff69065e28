import { Request } from 'express';
import { ClientInfo } from './services/session.service';

export function clientInfo(req: Request): ClientInfo {
  return { ip: req.ip, userAgent: req.headers['user-agent'] };
}
