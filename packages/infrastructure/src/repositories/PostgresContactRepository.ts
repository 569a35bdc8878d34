/**
 * @fileoverview PostgreSQL contact repository (Infrastructure Layer)
 *
 * @module @chatrouter/infrastructure/repositories/postgres-contact-repository
 */

import { NotFoundError, type DatabaseClient } from '@chatrouter/core';
import type {
  Contact,
  ContactPatch,
  ContactRepository,
  NewContactInput,
} from '@chatrouter/domain';

import { returnedRow, rowToContact, type ContactRow } from './rows.js';

const CONTACT_COLUMNS = 'id, external_id, name, email, phone, created_at, updated_at';

const PATCH_COLUMNS = {
  externalId: 'external_id',
  name: 'name',
  email: 'email',
  phone: 'phone',
} as const satisfies Record<keyof ContactPatch, string>;

const PATCH_FIELDS = ['externalId', 'name', 'email', 'phone'] as const;

export class PostgresContactRepository implements ContactRepository {
  constructor(private readonly db: DatabaseClient) {}

  async findById(contactId: number): Promise<Contact | null> {
    return this.findOne('id = $1', contactId);
  }

  async findByExternalId(externalId: string): Promise<Contact | null> {
    return this.findOne('external_id = $1', externalId);
  }

  async findByEmail(email: string): Promise<Contact | null> {
    return this.findOne('LOWER(email) = LOWER($1)', email);
  }

  async findByPhone(phone: string): Promise<Contact | null> {
    return this.findOne('phone = $1', phone);
  }

  async create(input: NewContactInput, at: Date): Promise<Contact> {
    const result = await this.db.query<ContactRow>(
      `INSERT INTO contacts (external_id, name, email, phone, created_at, updated_at)
       VALUES ($1, $2, $3, $4, $5, $5)
       RETURNING ${CONTACT_COLUMNS}`,
      [input.externalId, input.name, input.email, input.phone, at]
    );
    return rowToContact(returnedRow(result, 'createContact'));
  }

  async update(contactId: number, patch: ContactPatch, at: Date): Promise<Contact> {
    const params: unknown[] = [contactId, at];
    const assignments = ['updated_at = $2'];

    for (const field of PATCH_FIELDS) {
      const value = patch[field];
      if (value === undefined) continue;
      params.push(value);
      assignments.push(`${PATCH_COLUMNS[field]} = $${params.length}`);
    }

    const result = await this.db.query<ContactRow>(
      `UPDATE contacts SET ${assignments.join(', ')}
       WHERE id = $1
       RETURNING ${CONTACT_COLUMNS}`,
      params
    );
    const row = result.rows[0];
    if (!row) {
      throw new NotFoundError('Contact');
    }
    return rowToContact(row);
  }

  private async findOne(condition: string, value: string | number): Promise<Contact | null> {
    const result = await this.db.query<ContactRow>(
      `SELECT ${CONTACT_COLUMNS} FROM contacts WHERE ${condition} ORDER BY id ASC LIMIT 1`,
      [value]
    );
    const row = result.rows[0];
    return row ? rowToContact(row) : null;
  }
}
