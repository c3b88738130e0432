import {
  Ticket,
  TicketPriority,
  TicketStatus,
} from '../tickets/ticket.types';

const HOUR_MS = 60 * 60 * 1000;

/** Resolution window per priority. Fixed; not configurable per team or tenant. */
export const SLA_RESOLUTION_HOURS: Readonly<Record<TicketPriority, number>> = {
  [TicketPriority.CRITICAL]: 4,
  [TicketPriority.HIGH]: 24,
  [TicketPriority.MEDIUM]: 3 * 24,
  [TicketPriority.LOW]: 7 * 24,
};

// Higher rank sorts first in breach listings.
const PRIORITY_RANK: Readonly<Record<TicketPriority, number>> = {
  [TicketPriority.CRITICAL]: 3,
  [TicketPriority.HIGH]: 2,
  [TicketPriority.MEDIUM]: 1,
  [TicketPriority.LOW]: 0,
};

const SLA_STOPPED_STATUSES: readonly TicketStatus[] = [
  TicketStatus.RESOLVED,
  TicketStatus.CLOSED,
];

/**
 * Deadline for a ticket of the given priority whose window starts at `now`.
 * Used at creation and on every priority change; the window always restarts.
 */
export function computeDeadline(priority: TicketPriority, now: Date): Date {
  return new Date(now.getTime() + SLA_RESOLUTION_HOURS[priority] * HOUR_MS);
}

export function isSlaStopped(status: TicketStatus): boolean {
  return SLA_STOPPED_STATUSES.includes(status);
}

export function isSlaBreached(
  ticket: Pick<Ticket, 'slaDeadline' | 'status'>,
  now: Date,
): boolean {
  return (
    ticket.slaDeadline.getTime() < now.getTime() && !isSlaStopped(ticket.status)
  );
}

/** Most urgent first: priority descending, then the oldest deadline. */
export function compareBreachUrgency(
  a: Pick<Ticket, 'priority' | 'slaDeadline'>,
  b: Pick<Ticket, 'priority' | 'slaDeadline'>,
): number {
  const byPriority = PRIORITY_RANK[b.priority] - PRIORITY_RANK[a.priority];
  if (byPriority !== 0) {
    return byPriority;
  }
  return a.slaDeadline.getTime() - b.slaDeadline.getTime();
}
