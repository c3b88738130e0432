import {
  BadRequestException,
  ConflictException,
  UnprocessableEntityException,
} from '@nestjs/common';
import { TicketStatus } from '../tickets/ticket.types';

/** The caller is allowed to act, but the ticket is not in a state that permits it. */
export class InvalidOperationException extends BadRequestException {
  constructor(message: string) {
    super(message);
  }
}

export class InvalidTransitionException extends UnprocessableEntityException {
  constructor(
    readonly from: TicketStatus,
    readonly to: TicketStatus,
  ) {
    super(`Invalid status transition from ${from} to ${to}`);
  }
}

/** Raised when a write loses an optimistic concurrency race; re-read and retry. */
export class TicketConflictException extends ConflictException {
  constructor(readonly ticketId: string) {
    super(`Ticket ${ticketId} was modified concurrently; reload and retry`);
  }
}
