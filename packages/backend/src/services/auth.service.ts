import { randomUUID } from 'node:crypto';
import { eq } from 'drizzle-orm';
import { db, isUniqueViolation } from '../lib/db.js';
import { users, type User } from '../db/schema.js';
import { hashPassword, verifyPassword } from '../lib/auth.js';
import type { AppConfig } from '../lib/config/app.js';
import { ConflictError, NotFoundError, UnauthorizedError } from '../lib/errors.js';
import type {
  ChangePasswordInput,
  LoginInput,
  RegisterInput,
  UserResponse,
} from '../schemas/auth.schema.js';

/**
 * Transform user from database to response (exclude sensitive fields)
 */
export function toUserResponse(user: User): UserResponse {
  return {
    id: user.id,
    email: user.email,
    firstName: user.firstName,
    lastName: user.lastName,
    isAdmin: user.isAdmin,
    isActive: user.isActive,
    lastLoginAt: user.lastLoginAt,
    createdAt: user.createdAt,
    updatedAt: user.updatedAt,
  };
}

function normalizeEmail(email: string): string {
  return email.trim().toLowerCase();
}

function findUserByEmail(email: string): User | undefined {
  return db.select().from(users).where(eq(users.email, normalizeEmail(email))).get();
}

/**
 * Register a new user
 */
export async function register(input: RegisterInput): Promise<UserResponse> {
  if (findUserByEmail(input.email)) {
    throw new ConflictError(`User with email '${input.email}' already exists`);
  }

  const passwordHash = await hashPassword(input.password);
  const now = new Date();

  let user: User;
  try {
    user = db
      .insert(users)
      .values({
        id: randomUUID(),
        email: normalizeEmail(input.email),
        firstName: input.firstName,
        lastName: input.lastName,
        passwordHash,
        isAdmin: false,
        isActive: true,
        createdAt: now,
        updatedAt: now,
      })
      .returning()
      .get();
  } catch (error) {
    // A concurrent registration took the email while the password was hashing.
    if (isUniqueViolation(error)) {
      throw new ConflictError(`User with email '${input.email}' already exists`);
    }
    throw error;
  }

  return toUserResponse(user);
}

/**
 * Check credentials and record the login time.
 * Unknown email, wrong password and disabled accounts all fail the same way.
 */
export async function login(input: LoginInput): Promise<UserResponse> {
  const user = findUserByEmail(input.email);
  if (!user || !user.isActive) {
    throw new UnauthorizedError('Invalid email or password');
  }

  if (!(await verifyPassword(input.password, user.passwordHash))) {
    throw new UnauthorizedError('Invalid email or password');
  }

  const updated = db
    .update(users)
    .set({ lastLoginAt: new Date() })
    .where(eq(users.id, user.id))
    .returning()
    .get();

  return toUserResponse(updated);
}

/**
 * Get user by ID
 */
export async function getUserById(userId: string): Promise<UserResponse> {
  const user = db.select().from(users).where(eq(users.id, userId)).get();
  if (!user) {
    throw new NotFoundError('User', userId);
  }
  return toUserResponse(user);
}

export async function changePassword(userId: string, input: ChangePasswordInput): Promise<void> {
  const user = db.select().from(users).where(eq(users.id, userId)).get();
  if (!user) {
    throw new NotFoundError('User', userId);
  }

  if (!(await verifyPassword(input.currentPassword, user.passwordHash))) {
    throw new UnauthorizedError('Current password is incorrect');
  }

  const passwordHash = await hashPassword(input.newPassword);
  db.update(users)
    .set({ passwordHash, updatedAt: new Date() })
    .where(eq(users.id, userId))
    .run();
}

/**
 * Make sure the configured admin account exists. Returns true when it was created.
 */
export async function ensureSeedAdmin(config: Pick<AppConfig, 'seedAdmin'>): Promise<boolean> {
  if (!config.seedAdmin) {
    return false;
  }

  const { email, password } = config.seedAdmin;
  const existing = findUserByEmail(email);
  if (existing) {
    if (!existing.isAdmin) {
      db.update(users)
        .set({ isAdmin: true, updatedAt: new Date() })
        .where(eq(users.id, existing.id))
        .run();
    }
    return false;
  }

  const now = new Date();
  db.insert(users)
    .values({
      id: randomUUID(),
      email: normalizeEmail(email),
      firstName: 'Admin',
      lastName: 'User',
      passwordHash: await hashPassword(password),
      isAdmin: true,
      isActive: true,
      createdAt: now,
      updatedAt: now,
    })
    .run();
  return true;
}
