import winston from 'winston';
import { env } from '../config/env';

// Meta keys that carry customer contact details.
const CONTACT_KEYS = ['to', 'phone', 'email'];

export function maskContact(value: string): string {
  const at = value.indexOf('@');
  if (at > 0) {
    return `${value[0]}***${value.slice(at)}`;
  }
  return value.length > 4 ? `***${value.slice(-4)}` : '***';
}

const maskContactDetails = winston.format((info) => {
  for (const key of CONTACT_KEYS) {
    const value = info[key];
    if (typeof value === 'string') {
      info[key] = maskContact(value);
    }
  }
  return info;
});

export const logger = winston.createLogger({
  level: env.LOG_LEVEL ?? (env.NODE_ENV === 'production' ? 'info' : 'debug'),
  silent: env.NODE_ENV === 'test',
  format: winston.format.combine(
    maskContactDetails(),
    winston.format.timestamp(),
    winston.format.errors({ stack: true }),
    env.NODE_ENV === 'production'
      ? winston.format.json()
      : winston.format.combine(winston.format.colorize(), winston.format.simple())
  ),
  defaultMeta: { service: 'insurance-intake-agent' },
  transports: [new winston.transports.Console()],
});
