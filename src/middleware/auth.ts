import { Request, Response, NextFunction } from 'express';

function parseKeys(raw: string): Set<string> {
  return new Set(
    raw
      .split(',')
      .map((k) => k.trim())
      .filter((k) => k.length > 0)
  );
}

/**
 * Guards the coordinator API with an `x-api-key` header. Health checks stay
 * open so load balancers and peers can check health without credentials.
 */
export function apiKeyAuth(rawKeys: string) {
  const validKeys = parseKeys(rawKeys);

  return (req: Request, res: Response, next: NextFunction) => {
    if (req.path === '/health' || req.path.endsWith('/health')) {
      return next();
    }

    const apiKey = req.headers['x-api-key'];

    if (typeof apiKey !== 'string' || apiKey.length === 0) {
      return res.status(401).json({ success: false, error: 'Missing API key' });
    }

    if (validKeys.size === 0 || !validKeys.has(apiKey)) {
      return res.status(403).json({ success: false, error: 'Invalid API key' });
    }

    next();
  };
}
