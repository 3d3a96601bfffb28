import { Request, Response, NextFunction } from 'express';

export function parseApiKeys(raw: string | undefined): Set<string> {
  return new Set(
    (raw ?? '')
      .split(',')
      .map((k) => k.trim())
      .filter((k) => k.length > 0)
  );
}

/** Guards the admin surface with an x-api-key header. The health probe stays open. */
export function apiKeyAuth(rawKeys: string | undefined) {
  const keys = parseApiKeys(rawKeys);

  return (req: Request, res: Response, next: NextFunction) => {
    if (req.path === '/health') {
      return next();
    }

    const apiKey = req.header('x-api-key');

    if (!apiKey) {
      return res.status(401).json({ success: false, error: 'Missing API key' });
    }

    if (keys.size === 0 || !keys.has(apiKey)) {
      return res.status(403).json({ success: false, error: 'Invalid API key' });
    }

    next();
  };
}
