import { readFile } from 'node:fs/promises';
import { randomUUID } from 'node:crypto';
import { z } from 'zod';
import { isRole, type Role } from '../auth/enums/role.enum';
import type { InMemoryCredentialStore } from '../users/in-memory-credential.store';
import type { InMemoryExamDirectory } from '../exams/in-memory-exam.directory';

const roleSchema = z.custom<Role>(isRole, { message: 'Unknown role' });

const seedSchema = z.object({
  users: z
    .array(
      z.object({
        id: z.string().min(1).optional(),
        email: z.string().min(3),
        password: z.string().min(1),
        role: roleSchema
      })
    )
    .default([]),
  exams: z
    .array(
      z.object({
        id: z.string().min(1).optional(),
        title: z.string().min(1),
        date: z.coerce.date()
      })
    )
    .default([])
});

export type MemorySeed = z.infer<typeof seedSchema>;

export function parseMemorySeed(raw: unknown): MemorySeed {
  return seedSchema.parse(raw);
}

export async function readMemorySeed(path: string): Promise<MemorySeed> {
  const text = await readFile(path, 'utf8');
  return parseMemorySeed(JSON.parse(text));
}

/**
 * Load a seed into the memory stores. Plaintext passwords are hashed here,
 * so seed files never contain hashes.
 */
export async function applyMemorySeed(
  seed: MemorySeed,
  stores: { users: InMemoryCredentialStore; exams: InMemoryExamDirectory },
  hashPassword: (plain: string) => Promise<string>,
  now: Date
): Promise<{ users: number; exams: number }> {
  for (const user of seed.users) {
    stores.users.add({
      id: user.id ?? randomUUID(),
      email: user.email,
      passwordHash: await hashPassword(user.password),
      role: user.role,
      createdAt: now,
      updatedAt: now
    });
  }

  for (const exam of seed.exams) {
    stores.exams.add({ id: exam.id ?? randomUUID(), title: exam.title, date: exam.date });
  }

  return { users: seed.users.length, exams: seed.exams.length };
}
