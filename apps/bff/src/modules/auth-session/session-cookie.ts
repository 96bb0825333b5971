import type { Request, Response } from 'express';

export const SESSION_COOKIE_NAME = 'stakevault_session';

export function extractSessionId(req: Request): string | null {
  const cookieHeader = req.headers.cookie;
  if (!cookieHeader) {
    return null;
  }

  const cookies = cookieHeader.split(';').map((part) => part.trim());
  const sessionEntry = cookies.find((entry) => entry.startsWith(`${SESSION_COOKIE_NAME}=`));
  if (!sessionEntry) {
    return null;
  }

  const value = sessionEntry.substring(SESSION_COOKIE_NAME.length + 1);
  return value ? decodeURIComponent(value) : null;
}

export function setSessionCookie(res: Response, sessionId: string, maxAgeSeconds: number): void {
  res.setHeader('Set-Cookie', buildCookie(encodeURIComponent(sessionId), maxAgeSeconds));
}

export function clearSessionCookie(res: Response): void {
  res.setHeader('Set-Cookie', buildCookie('', 0));
}

function buildCookie(value: string, maxAgeSeconds: number): string {
  const secureFlag = process.env.NODE_ENV === 'production' ? ' Secure;' : '';
  return `${SESSION_COOKIE_NAME}=${value}; Path=/; HttpOnly; SameSite=Lax;${secureFlag} Max-Age=${maxAgeSeconds}`;
}
