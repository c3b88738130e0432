import type { NewTicket, Ticket, TicketStatus } from './ticket.types';

export const TICKET_STORE = Symbol('TICKET_STORE');

/**
 * Structured scan filter. Soft-deleted tickets are always excluded by the
 * store, so callers never filter on `deletedAt`.
 */
export type TicketScanFilter = {
  status?: TicketStatus;
  statusNotIn?: TicketStatus[];
  createdBy?: string;
  /** `null` matches unassigned tickets. */
  assignedTo?: string | null;
  slaDeadlineBefore?: Date;
};

export interface TicketStore {
  /** Returns null for unknown and soft-deleted tickets alike. */
  findById(id: string): Promise<Ticket | null>;

  insert(draft: NewTicket): Promise<Ticket>;

  /**
   * Writes the ticket if the stored version still equals `ticket.version`.
   * Returns the stored record with its bumped version, or null when another
   * write got there first (or the ticket has since been soft-deleted).
   */
  save(ticket: Ticket): Promise<Ticket | null>;

  /** Newest first. */
  scan(filter: TicketScanFilter): Promise<Ticket[]>;
}
