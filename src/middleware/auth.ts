import { Request, Response, NextFunction, RequestHandler } from 'express';

const PUBLIC_PATHS = new Set(['/health', '/api/admin/health']);

export function parseApiKeys(raw: string | undefined): string[] {
  return (raw ?? '')
    .split(',')
    .map((k) => k.trim())
    .filter((k) => k.length > 0);
}

export function apiKeyAuth(keys: string[]): RequestHandler {
  const validKeys = new Set(keys);

  return (req: Request, res: Response, next: NextFunction) => {
    if (PUBLIC_PATHS.has(req.path)) {
      return next();
    }

    const apiKey = req.header('x-api-key');

    if (!apiKey) {
      return res.status(401).json({ success: false, error: 'Missing API key' });
    }

    if (validKeys.size === 0 || !validKeys.has(apiKey)) {
      return res.status(403).json({ success: false, error: 'Invalid API key' });
    }

    next();
  };
}
