import { TicketStatus } from './ticket.types';

/**
 * Permitted status changes. Anything not listed here, including a move to the
 * current status, is an invalid transition. CLOSED is terminal.
 */
export const TICKET_TRANSITIONS: Readonly<
  Record<TicketStatus, readonly TicketStatus[]>
> = {
  [TicketStatus.OPEN]: [TicketStatus.IN_PROGRESS, TicketStatus.CLOSED],
  [TicketStatus.IN_PROGRESS]: [TicketStatus.RESOLVED, TicketStatus.OPEN],
  [TicketStatus.RESOLVED]: [TicketStatus.CLOSED, TicketStatus.IN_PROGRESS],
  [TicketStatus.CLOSED]: [],
};

export function isValidTransition(
  from: TicketStatus,
  to: TicketStatus,
): boolean {
  return TICKET_TRANSITIONS[from].includes(to);
}

export function isTerminalStatus(status: TicketStatus): boolean {
  return TICKET_TRANSITIONS[status].length === 0;
}
