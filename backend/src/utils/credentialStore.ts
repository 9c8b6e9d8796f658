import fs from 'fs/promises';
import { createHash, timingSafeEqual } from 'crypto';
import { z } from 'zod';
import { PublicUser, User } from '../types';
import { InvalidCredentials, UnknownUser } from './errors';

const employeeSchema = z.object({
  employee_id: z.string().min(1),
  username: z.string().min(1),
  email: z.string().email(),
  password_hash: z.string().regex(/^[0-9a-f]{64}$/, 'must be a SHA-256 hex digest'),
  first_name: z.string(),
  last_name: z.string(),
  department: z.string().min(1),
  position: z.string().default(''),
  is_admin: z.boolean().default(false),
  is_active: z.boolean().default(true)
});

const registrySchema = z.object({
  employees: z.record(employeeSchema)
});

export type RegistryFile = z.input<typeof registrySchema>;

export function hashPassword(password: string): string {
  return createHash('sha256').update(password).digest('hex');
}

function hashesMatch(a: string, b: string): boolean {
  const left = Buffer.from(a);
  const right = Buffer.from(b);
  return left.length === right.length && timingSafeEqual(left, right);
}

export function toPublicUser(user: User): PublicUser {
  const { passwordHash: _passwordHash, ...rest } = user;
  return rest;
}

/**
 * Parses the registry JSON into users keyed by username.
 * Throws with the zod issue list when the file does not validate.
 */
export function parseRegistry(raw: unknown): Map<string, User> {
  const parsed = registrySchema.safeParse(raw);
  if (!parsed.success) {
    const issues = parsed.error.issues.map(i => `${i.path.join('.')}: ${i.message}`).join('; ');
    throw new Error(`Invalid credential file: ${issues}`);
  }

  const users = new Map<string, User>();
  for (const [key, entry] of Object.entries(parsed.data.employees)) {
    const user: User = {
      username: entry.username,
      employeeId: entry.employee_id,
      displayName: `${entry.first_name} ${entry.last_name}`.trim(),
      email: entry.email,
      department: entry.department,
      position: entry.position,
      role: entry.is_admin ? 'admin' : 'employee',
      passwordHash: entry.password_hash,
      isActive: entry.is_active
    };
    users.set(key, Object.freeze(user));
  }
  return users;
}

export class CredentialStore {
  private users: Map<string, User>;

  constructor(users: Map<string, User>, private readonly filePath?: string) {
    this.users = users;
  }

  static async fromFile(filePath: string): Promise<CredentialStore> {
    const users = await readRegistry(filePath);
    console.log(`[auth] Loaded ${users.size} user(s) from ${filePath}`);
    return new CredentialStore(users, filePath);
  }

  static fromRegistry(registry: RegistryFile): CredentialStore {
    return new CredentialStore(parseRegistry(registry));
  }

  authenticate(username: string, password: string): User {
    const user = this.users.get(username);
    // Hash even for unknown users so the failure paths take similar time
    const candidate = hashPassword(password);
    if (!user || !user.isActive || !hashesMatch(candidate, user.passwordHash)) {
      throw new InvalidCredentials();
    }
    return user;
  }

  find(username: string): User | undefined {
    return this.users.get(username);
  }

  lookup(username: string): User {
    const user = this.find(username);
    if (!user) {
      throw new UnknownUser(username);
    }
    return user;
  }

  listUsers(): PublicUser[] {
    return [...this.users.values()]
      .map(toPublicUser)
      .sort((a, b) =>
        a.department.localeCompare(b.department) || a.displayName.localeCompare(b.displayName)
      );
  }

  /** Re-reads the registry file. Only happens when explicitly requested. */
  async reload(): Promise<number> {
    if (!this.filePath) {
      throw new Error('Credential store was not loaded from a file');
    }
    this.users = await readRegistry(this.filePath);
    console.log(`[auth] Reloaded ${this.users.size} user(s) from ${this.filePath}`);
    return this.users.size;
  }
}

async function readRegistry(filePath: string): Promise<Map<string, User>> {
  const text = await fs.readFile(filePath, 'utf-8');
  let raw: unknown;
  try {
    raw = JSON.parse(text);
  } catch (error) {
    throw new Error(`Credential file ${filePath} is not valid JSON: ${error instanceof Error ? error.message : String(error)}`);
  }
  return parseRegistry(raw);
}
