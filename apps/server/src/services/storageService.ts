import Database from 'better-sqlite3';
import { readFileSync } from 'fs';
import { fileURLToPath } from 'url';
import { dirname, join } from 'path';
import {
  NotFoundError,
  createTicketSchema,
  parseInput,
  ticketFiltersSchema,
  updateTicketSchema,
} from '@support-desk/shared';
import type {
  Ticket,
  TicketCategory,
  TicketPriority,
  TicketStats,
} from '@support-desk/shared';

const __filename = fileURLToPath(import.meta.url);
const __dirname = dirname(__filename);

// Rows are constrained by the CHECKs in schema.sql
type TicketRow = Ticket;

interface StorageOptions {
  now?: () => Date;
}

function escapeLike(value: string): string {
  return value.replace(/[\\%_]/g, (ch) => `\\${ch}`);
}


class StorageService {
  private db: Database.Database;
  private now: () => Date;

  constructor(dbPath: string, options: StorageOptions = {}) {
    this.db = new Database(dbPath);
    this.db.pragma('journal_mode = WAL');
    this.now = options.now ?? (() => new Date());
    // SQLite's LIKE folds ASCII only; search compares fold()ed text instead
    this.db.function('fold', { deterministic: true }, (value: string) => value.toLowerCase());
    this.initSchema();
  }

  private initSchema() {
    const schemaPath = join(__dirname, '../db/schema.sql');
    const schema = readFileSync(schemaPath, 'utf-8');
    this.db.exec(schema);
  }

  // Ticket methods
  createTicket(input: unknown): Ticket {
    const data = parseInput(createTicketSchema, input);
    const stmt = this.db.prepare<[string, string, string, string, string], TicketRow>(`
      INSERT INTO tickets (title, description, category, priority, status, created_at)
      VALUES (?, ?, ?, ?, 'open', ?)
      RETURNING *
    `);
    const row = stmt.get(
      data.title,
      data.description,
      data.category,
      data.priority,
      this.now().toISOString()
    );
    if (!row) {
      throw new Error('Insert returned no row');
    }
    return this.mapTicketRow(row);
  }

  getTicket(id: number): Ticket | null {
    const stmt = this.db.prepare<[number], TicketRow>('SELECT * FROM tickets WHERE id = ?');
    const row = stmt.get(id);
    return row ? this.mapTicketRow(row) : null;
  }

  getTickets(filters: unknown = {}): Ticket[] {
    const { category, priority, status, search } = parseInput(ticketFiltersSchema, filters);
    let query = 'SELECT * FROM tickets WHERE 1=1';
    const params: string[] = [];

    if (category) {
      query += ' AND category = ?';
      params.push(category);
    }
    if (priority) {
      query += ' AND priority = ?';
      params.push(priority);
    }
    if (status) {
      query += ' AND status = ?';
      params.push(status);
    }
    if (search) {
      const pattern = `%${escapeLike(search.toLowerCase())}%`;
      query += " AND (fold(title) LIKE ? ESCAPE '\\' OR fold(description) LIKE ? ESCAPE '\\')";
      params.push(pattern, pattern);
    }

    query += ' ORDER BY created_at DESC, id DESC';

    const stmt = this.db.prepare<string[], TicketRow>(query);
    return stmt.all(...params).map((row) => this.mapTicketRow(row));
  }

  updateTicket(id: number, input: unknown): Ticket {
    const data = parseInput(updateTicketSchema, input);

    const updates: string[] = [];
    const params: (string | number)[] = [];

    if (data.status !== undefined) {
      updates.push('status = ?');
      params.push(data.status);
    }
    if (data.category !== undefined) {
      updates.push('category = ?');
      params.push(data.category);
    }
    if (data.priority !== undefined) {
      updates.push('priority = ?');
      params.push(data.priority);
    }

    if (updates.length === 0) {
      const existing = this.getTicket(id);
      if (!existing) throw new NotFoundError(`Ticket ${id} not found`);
      return existing;
    }

    params.push(id);
    const stmt = this.db.prepare<(string | number)[], TicketRow>(
      `UPDATE tickets SET ${updates.join(', ')} WHERE id = ? RETURNING *`
    );
    const row = stmt.get(...params);
    if (!row) throw new NotFoundError(`Ticket ${id} not found`);
    return this.mapTicketRow(row);
  }

  // Stats are aggregated in SQL inside one read transaction
  getTicketStats(): TicketStats {
    const totalsStmt = this.db.prepare<[], { total: number; open: number; days: number }>(`
      SELECT
        COUNT(*) AS total,
        COALESCE(SUM(CASE WHEN status = 'open' THEN 1 ELSE 0 END), 0) AS open,
        COUNT(DISTINCT date(created_at)) AS days
      FROM tickets
    `);
    const priorityStmt = this.db.prepare<[], { key: TicketPriority; count: number }>(
      'SELECT priority AS key, COUNT(*) AS count FROM tickets GROUP BY priority'
    );
    const categoryStmt = this.db.prepare<[], { key: TicketCategory; count: number }>(
      'SELECT category AS key, COUNT(*) AS count FROM tickets GROUP BY category'
    );

    const snapshot = this.db.transaction((): TicketStats => {
      const totals = totalsStmt.get() ?? { total: 0, open: 0, days: 0 };

      const priorityBreakdown: Record<TicketPriority, number> = { low: 0, medium: 0, high: 0, critical: 0 };
      for (const row of priorityStmt.all()) {
        priorityBreakdown[row.key] = row.count;
      }
      const categoryBreakdown: Record<TicketCategory, number> = { billing: 0, technical: 0, account: 0, general: 0 };
      for (const row of categoryStmt.all()) {
        categoryBreakdown[row.key] = row.count;
      }

      return {
        total_tickets: totals.total,
        open_tickets: totals.open,
        avg_tickets_per_day: totals.days > 0 ? Math.round((totals.total / totals.days) * 10) / 10 : 0,
        priority_breakdown: priorityBreakdown,
        category_breakdown: categoryBreakdown,
      };
    });
    return snapshot();
  }

  private mapTicketRow(row: TicketRow): Ticket {
    return {
      id: row.id,
      title: row.title,
      description: row.description,
      category: row.category,
      priority: row.priority,
      status: row.status,
      created_at: row.created_at,
    };
  }

  close() {
    this.db.close();
  }
}

export const createStorageService = (dbPath: string, options?: StorageOptions) =>
  new StorageService(dbPath, options);
export type { StorageService, StorageOptions };
