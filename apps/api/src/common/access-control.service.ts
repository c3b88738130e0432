import { Injectable } from '@nestjs/common';
import type { Ticket } from '../tickets/ticket.types';
import { UserRole } from '../users/user.types';

type Actor = { id: string; role: UserRole };

/**
 * Single authorization gate for ticket lifecycle actions.
 * Every method is a pure predicate: callers decide which exception to raise.
 */
@Injectable()
export class AccessControlService {
  isAgentOrAdmin(user: Pick<Actor, 'role'>): boolean {
    return user.role === UserRole.AGENT || user.role === UserRole.ADMIN;
  }

  canAssignTickets(user: Pick<Actor, 'role'>): boolean {
    return this.isAgentOrAdmin(user);
  }

  canResolveTickets(user: Pick<Actor, 'role'>): boolean {
    return this.isAgentOrAdmin(user);
  }

  canDeleteTickets(user: Pick<Actor, 'role'>): boolean {
    return user.role === UserRole.ADMIN;
  }

  /**
   * Admins modify anything. Agents modify unassigned tickets and their own.
   * Customers modify only tickets they created.
   */
  canModifyTicket(
    user: Actor,
    ticket: Pick<Ticket, 'createdBy' | 'assignedTo'>,
  ): boolean {
    switch (user.role) {
      case UserRole.ADMIN:
        return true;
      case UserRole.AGENT:
        return ticket.assignedTo === null || ticket.assignedTo === user.id;
      case UserRole.CUSTOMER:
        return ticket.createdBy === user.id;
    }
  }

  canViewTicket(user: Actor, ticket: Pick<Ticket, 'createdBy'>): boolean {
    if (this.isAgentOrAdmin(user)) {
      return true;
    }
    return ticket.createdBy === user.id;
  }
}
