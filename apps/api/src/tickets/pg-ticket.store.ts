import { Injectable } from '@nestjs/common';
import { DatabaseService } from '../database/database.service';
import type { TicketScanFilter, TicketStore } from './ticket-store';
import type {
  NewTicket,
  Ticket,
  TicketPriority,
  TicketStatus,
} from './ticket.types';

type TicketRow = {
  id: string;
  title: string;
  description: string;
  status: TicketStatus;
  priority: TicketPriority;
  created_by: string;
  assigned_to: string | null;
  sla_deadline: Date;
  resolved_at: Date | null;
  version: number;
  created_at: Date;
  updated_at: Date;
  deleted_at: Date | null;
};

const TICKET_COLUMNS = `id, title, description, status, priority, created_by, assigned_to,
  sla_deadline, resolved_at, version, created_at, updated_at, deleted_at`;

@Injectable()
export class PgTicketStore implements TicketStore {
  constructor(private readonly db: DatabaseService) {}

  async findById(id: string): Promise<Ticket | null> {
    const result = await this.db.query<TicketRow>(
      `SELECT ${TICKET_COLUMNS} FROM tickets WHERE id = $1 AND deleted_at IS NULL`,
      [id],
    );
    const row = result.rows[0];
    return row ? this.toTicket(row) : null;
  }

  async insert(draft: NewTicket): Promise<Ticket> {
    const result = await this.db.query<TicketRow>(
      `INSERT INTO tickets (title, description, status, priority, created_by, sla_deadline)
       VALUES ($1, $2, $3, $4, $5, $6)
       RETURNING ${TICKET_COLUMNS}`,
      [
        draft.title,
        draft.description,
        draft.status,
        draft.priority,
        draft.createdBy,
        draft.slaDeadline,
      ],
    );
    return this.toTicket(result.rows[0]);
  }

  async save(ticket: Ticket): Promise<Ticket | null> {
    const result = await this.db.query<TicketRow>(
      `UPDATE tickets
          SET title = $3,
              description = $4,
              status = $5,
              priority = $6,
              assigned_to = $7,
              sla_deadline = $8,
              resolved_at = $9,
              deleted_at = $10,
              version = version + 1,
              updated_at = now()
        WHERE id = $1 AND version = $2 AND deleted_at IS NULL
        RETURNING ${TICKET_COLUMNS}`,
      [
        ticket.id,
        ticket.version,
        ticket.title,
        ticket.description,
        ticket.status,
        ticket.priority,
        ticket.assignedTo,
        ticket.slaDeadline,
        ticket.resolvedAt,
        ticket.deletedAt,
      ],
    );
    const row = result.rows[0];
    return row ? this.toTicket(row) : null;
  }

  async scan(filter: TicketScanFilter): Promise<Ticket[]> {
    const conditions = ['deleted_at IS NULL'];
    const params: unknown[] = [];
    const bind = (value: unknown) => {
      params.push(value);
      return `$${params.length}`;
    };

    if (filter.status) {
      conditions.push(`status = ${bind(filter.status)}`);
    }
    if (filter.statusNotIn?.length) {
      conditions.push(`status <> ALL(${bind(filter.statusNotIn)}::ticket_status[])`);
    }
    if (filter.createdBy) {
      conditions.push(`created_by = ${bind(filter.createdBy)}`);
    }
    if (filter.assignedTo === null) {
      conditions.push('assigned_to IS NULL');
    } else if (filter.assignedTo !== undefined) {
      conditions.push(`assigned_to = ${bind(filter.assignedTo)}`);
    }
    if (filter.slaDeadlineBefore) {
      conditions.push(`sla_deadline < ${bind(filter.slaDeadlineBefore)}`);
    }

    const result = await this.db.query<TicketRow>(
      `SELECT ${TICKET_COLUMNS} FROM tickets
        WHERE ${conditions.join(' AND ')}
        ORDER BY created_at DESC`,
      params,
    );
    return result.rows.map((row) => this.toTicket(row));
  }

  private toTicket(row: TicketRow): Ticket {
    return {
      id: row.id,
      title: row.title,
      description: row.description,
      status: row.status,
      priority: row.priority,
      createdBy: row.created_by,
      assignedTo: row.assigned_to,
      slaDeadline: row.sla_deadline,
      resolvedAt: row.resolved_at,
      version: row.version,
      createdAt: row.created_at,
      updatedAt: row.updated_at,
      deletedAt: row.deleted_at,
    };
  }
}
