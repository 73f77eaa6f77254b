import { timingSafeEqual } from 'crypto';
import type { NextFunction, Request, Response } from 'express';
import { env } from '../config/env';
import { AppError } from '../errors';

function extractBearerToken(req: Request): string | null {
	const header = req.headers.authorization;
	if (!header) return null;
	const [scheme, token] = header.split(' ');
	if (!scheme || scheme.toLowerCase() !== 'bearer') return null;
	return token?.trim() || null;
}

function tokensMatch(presented: string, expected: string): boolean {
	const a = Buffer.from(presented);
	const b = Buffer.from(expected);
	return a.length === b.length && timingSafeEqual(a, b);
}

/**
 * Guards operator endpoints with the static `ADMIN_API_TOKEN`.
 * With no token configured the endpoints are disabled outright.
 */
export function requireAdminToken(req: Request, _res: Response, next: NextFunction): void {
	const expected = env.ADMIN_API_TOKEN;
	if (!expected) {
		next(AppError.forbidden('Admin API is disabled'));
		return;
	}

	const token = extractBearerToken(req);
	if (!token) {
		next(AppError.unauthorized('Authorization token required'));
		return;
	}
	if (!tokensMatch(token, expected)) {
		next(AppError.unauthorized('Invalid admin token'));
		return;
	}
	next();
}
