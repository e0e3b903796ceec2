import { eq } from 'drizzle-orm';
import { db } from '@/database/client.js';
import { users, type User } from '@/database/schema.js';
import { config } from '@config/app.config.js';
import { AppError } from '@shared/errors/app-error.js';
import { ErrorCodes } from '@shared/errors/error-codes.js';
import { isUniqueViolation, persistenceError } from '@shared/utils/db-errors.js';
import { hashPassword, verifyPassword } from '@shared/utils/password.js';
import { logger } from '@shared/utils/logger.js';
import type { CallerContext } from '@shared/types/context.js';
import type { AuthUser } from '@shared/types/fastify.js';
import {
  linkParticipantInTransaction,
  prepareLink,
  type LinkOutcomeType,
  type LinkRequest,
} from '@modules/participants/participants.service.js';
import { UserRole } from './permissions.js';
import type { RegisterAccountInput } from './users.schema.js';

const publicColumns = {
  id: users.id,
  email: users.email,
  role: users.role,
  displayName: users.displayName,
  createdAt: users.createdAt,
};

function toAuthUser(user: User): AuthUser {
  const { passwordHash: _passwordHash, ...rest } = user;
  return rest;
}

/**
 * Check the sign-up access code for the requested role.
 * Staff accounts always need one; a caregiver code is optional but must match when sent.
 */
function checkAccessCode(role: RegisterAccountInput['role'], accessCode: string | undefined): void {
  if (role === UserRole.ADMIN) {
    if (accessCode !== config.auth.staffAccessCode) {
      throw new AppError('Invalid staff access code', 400, true, ErrorCodes.INVALID_ACCESS_CODE);
    }
    return;
  }

  const expected = config.auth.caregiverAccessCode;
  if (accessCode && expected && accessCode !== expected) {
    throw new AppError('Invalid caregiver access code', 400, true, ErrorCodes.INVALID_ACCESS_CODE);
  }
}

const EMAIL_UNIQUE = 'users_email_unique';

/**
 * Create an account. When a natural identifier is given the matching
 * participant is linked to the new account (or created for it) in the same
 * transaction: if the link fails, no account is left behind.
 */
export async function registerAccount(
  ctx: CallerContext,
  input: RegisterAccountInput
): Promise<{ user: AuthUser; participantLink: LinkOutcomeType | null }> {
  const { email, password, name, role, accessCode, naturalId } = input;

  checkAccessCode(role, accessCode);

  const [existing] = await db.select({ id: users.id }).from(users).where(eq(users.email, email));
  if (existing) {
    throw new AppError('Email already registered', 409, true, ErrorCodes.CONFLICT);
  }

  const linkRequest: LinkRequest | null = naturalId ? prepareLink({ naturalId, name }) : null;
  const passwordHash = await hashPassword(password);

  let result: { user: AuthUser; participantLink: LinkOutcomeType | null };
  try {
    result = await db.transaction(async (tx) => {
      const [created] = await tx
        .insert(users)
        .values({ email, passwordHash, role, displayName: name, createdAt: new Date() })
        .returning();
      const user = toAuthUser(created);

      if (!linkRequest) return { user, participantLink: null };

      const link = await linkParticipantInTransaction(tx, user.id, linkRequest);
      return { user, participantLink: link.outcome };
    });
  } catch (error) {
    if (isUniqueViolation(error, EMAIL_UNIQUE)) {
      throw new AppError('Email already registered', 409, true, ErrorCodes.CONFLICT);
    }
    throw persistenceError('create account', error);
  }

  logger.info(
    { requestId: ctx.requestId, userId: result.user.id, participantLink: result.participantLink },
    'Account created'
  );
  return result;
}

/**
 * Check an email/password pair.
 */
export async function authenticate(email: string, password: string): Promise<AuthUser> {
  const [user] = await db.select().from(users).where(eq(users.email, email)).limit(1);

  if (!user || !(await verifyPassword(password, user.passwordHash))) {
    throw new AppError('Invalid email or password', 401, true, ErrorCodes.INVALID_CREDENTIALS);
  }

  return toAuthUser(user);
}

/**
 * Get user by ID from database.
 */
export async function getUserById(id: number): Promise<AuthUser | null> {
  const [user] = await db.select(publicColumns).from(users).where(eq(users.id, id)).limit(1);
  return user ?? null;
}
