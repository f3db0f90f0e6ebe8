import jwt, { SignOptions } from 'jsonwebtoken';
import { z } from 'zod';
import { config } from '../config';
import { Actor, AuthTokenPayload, Role } from '../types/auth.types';
import { ApiError } from '../utils/response';

const tokenPayloadSchema = z.object({
  userId: z.string().min(1),
  email: z.string(),
  roles: z.array(z.nativeEnum(Role)),
});

/**
 * Issues and verifies the bearer tokens the API reads actors from. Users and
 * sessions live elsewhere; this only holds the shared secret.
 */
export class AuthService {
  constructor(
    private readonly secret: string = config.jwt.secret,
    private readonly expiresInSeconds: number = config.jwt.expiresInSeconds
  ) {}

  generateToken(payload: AuthTokenPayload): string {
    const options: SignOptions = { expiresIn: this.expiresInSeconds };
    return jwt.sign({ ...payload }, this.secret, options);
  }

  verifyToken(token: string): AuthTokenPayload {
    let decoded: string | jwt.JwtPayload;
    try {
      decoded = jwt.verify(token, this.secret);
    } catch (error) {
      throw new ApiError(401, 'Invalid or expired token');
    }

    const parsed = tokenPayloadSchema.safeParse(decoded);
    if (!parsed.success) {
      throw new ApiError(401, 'Malformed token payload');
    }
    return parsed.data;
  }
}

export const toActor = (payload: AuthTokenPayload): Actor => ({
  userId: payload.userId,
  email: payload.email,
  roles: payload.roles,
});

export const authService = new AuthService();
