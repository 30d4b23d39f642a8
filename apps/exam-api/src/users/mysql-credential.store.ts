import { Injectable } from '@nestjs/common';
import type { RowDataPacket } from 'mysql2';
import { isRole } from '../auth/enums/role.enum';
import { DatabaseService } from '../database/database.service';
import type { CredentialStore } from './credential-store';
import type { User } from './user.entity';

interface UserRow extends RowDataPacket {
  id: string;
  email: string;
  password_hash: string;
  role: string;
  created_at: Date;
  updated_at: Date;
}

function toUser(row: UserRow): User {
  if (!isRole(row.role)) {
    // A row with an unknown role is a provisioning bug, not a login failure.
    throw new Error(`User ${row.id} has unknown role`);
  }
  return {
    id: row.id,
    email: row.email,
    passwordHash: row.password_hash,
    role: row.role,
    createdAt: row.created_at,
    updatedAt: row.updated_at
  };
}

@Injectable()
export class MysqlCredentialStore implements CredentialStore {
  constructor(private readonly db: DatabaseService) {}

  async findByEmail(normalizedEmail: string): Promise<User | null> {
    const rows = await this.db.sql<UserRow[]>`
      SELECT id, email, password_hash, role, created_at, updated_at
      FROM users WHERE email = ${normalizedEmail} LIMIT 1
    `;
    return rows.length > 0 ? toUser(rows[0]) : null;
  }

  async findById(id: string): Promise<User | null> {
    const rows = await this.db.sql<UserRow[]>`
      SELECT id, email, password_hash, role, created_at, updated_at
      FROM users WHERE id = ${id} LIMIT 1
    `;
    return rows.length > 0 ? toUser(rows[0]) : null;
  }
}
