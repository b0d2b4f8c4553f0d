import type { Request, Response } from 'express';

export type FlashType = 'success' | 'error';

export interface Flash {
  type: FlashType;
  message: string;
}

export const FLASH_COOKIE = 'flash';

const cookieOptions = { httpOnly: true, sameSite: 'lax', path: '/' } as const;

/** Stores a message for the next rendered page. Express serializes the object as a `j:` JSON cookie. */
export function setFlash(res: Response, flash: Flash): void {
  res.cookie(FLASH_COOKIE, flash, cookieOptions);
}

/** Reads the pending flash message, if any, and clears it so it shows only once. */
export function takeFlash(req: Request, res: Response): Flash | undefined {
  const cookies: Record<string, unknown> = req.cookies ?? {};
  const raw = cookies[FLASH_COOKIE];

  if (raw === undefined) {
    return undefined;
  }

  res.clearCookie(FLASH_COOKIE, cookieOptions);
  return isFlash(raw) ? { type: raw.type, message: raw.message } : undefined;
}

function isFlash(value: unknown): value is Flash {
  if (typeof value !== 'object' || value === null || !('type' in value) || !('message' in value)) {
    return false;
  }

  return (value.type === 'success' || value.type === 'error') && typeof value.message === 'string';
}
