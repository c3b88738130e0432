import {
  ForbiddenException,
  Inject,
  Injectable,
  Logger,
  NotFoundException,
} from '@nestjs/common';
import { AccessControlService } from '../common/access-control.service';
import {
  InvalidOperationException,
  InvalidTransitionException,
  TicketConflictException,
} from '../common/lifecycle.exceptions';
import {
  compareBreachUrgency,
  computeDeadline,
  isSlaBreached,
} from '../slas/sla-calculator';
import { USER_DIRECTORY, type UserDirectory } from '../users/user-directory';
import { CreateTicketDto } from './dto/create-ticket.dto';
import { ListTicketsDto } from './dto/list-tickets.dto';
import { UpdateTicketDto } from './dto/update-ticket.dto';
import {
  TICKET_STORE,
  type TicketScanFilter,
  type TicketStore,
} from './ticket-store';
import { isValidTransition } from './ticket-transitions';
import {
  Ticket,
  TicketPriority,
  TicketStatus,
  TicketView,
} from './ticket.types';

@Injectable()
export class TicketsService {
  private readonly logger = new Logger(TicketsService.name);

  constructor(
    @Inject(TICKET_STORE) private readonly store: TicketStore,
    @Inject(USER_DIRECTORY) private readonly directory: UserDirectory,
    private readonly accessControl: AccessControlService,
  ) {}

  async create(payload: CreateTicketDto, creatorId: string) {
    const creator = await this.directory.resolve(creatorId);
    const now = new Date();
    const priority = payload.priority ?? TicketPriority.MEDIUM;

    const ticket = await this.store.insert({
      title: payload.title,
      description: payload.description,
      priority,
      status: TicketStatus.OPEN,
      createdBy: creator.id,
      slaDeadline: computeDeadline(priority, now),
    });

    this.logger.log(
      `Ticket ${ticket.id} created by ${creator.id} with priority ${priority}`,
    );
    return this.toView(ticket);
  }

  async getById(ticketId: string, actorId: string) {
    const ticket = await this.loadTicket(ticketId);
    const actor = await this.directory.resolve(actorId);

    if (!this.accessControl.canViewTicket(actor, ticket)) {
      throw new ForbiddenException('No access to this ticket');
    }

    return this.toView(ticket);
  }

  async list(query: ListTicketsDto, actorId: string) {
    const actor = await this.directory.resolve(actorId);
    const isStaff = this.accessControl.isAgentOrAdmin(actor);
    const scope = query.scope ?? (isStaff ? 'all' : 'created');

    if (!isStaff && scope !== 'created') {
      throw new ForbiddenException('Customers can only list their own tickets');
    }

    const filter: TicketScanFilter = { status: query.status };
    if (scope === 'created') {
      filter.createdBy = actor.id;
    } else if (scope === 'assigned') {
      filter.assignedTo = actor.id;
    } else if (scope === 'unassigned') {
      filter.assignedTo = null;
    }

    const tickets = await this.store.scan(filter);
    const now = new Date();
    return tickets.map((ticket) => this.toView(ticket, now));
  }

  async updateDetails(
    ticketId: string,
    payload: UpdateTicketDto,
    actorId: string,
  ) {
    const ticket = await this.loadTicket(ticketId);
    const actor = await this.directory.resolve(actorId);

    if (!this.accessControl.canModifyTicket(actor, ticket)) {
      throw new ForbiddenException(
        'You do not have permission to modify this ticket',
      );
    }

    if (payload.title === undefined && payload.description === undefined) {
      throw new InvalidOperationException('Nothing to update');
    }

    const updated = await this.persist({
      ...ticket,
      title: payload.title ?? ticket.title,
      description: payload.description ?? ticket.description,
    });

    this.logger.log(`Ticket ${ticket.id} details updated by ${actor.id}`);
    return this.toView(updated);
  }

  async updateStatus(ticketId: string, status: TicketStatus, actorId: string) {
    const ticket = await this.loadTicket(ticketId);
    const actor = await this.directory.resolve(actorId);

    if (!isValidTransition(ticket.status, status)) {
      throw new InvalidTransitionException(ticket.status, status);
    }

    if (
      status === TicketStatus.RESOLVED &&
      !this.accessControl.canResolveTickets(actor)
    ) {
      throw new ForbiddenException('Only agents can resolve tickets');
    }

    if (status === TicketStatus.IN_PROGRESS && ticket.assignedTo === null) {
      throw new InvalidOperationException(
        'Ticket must be assigned before it can be moved to IN_PROGRESS',
      );
    }

    const updated = await this.persist({
      ...ticket,
      status,
      resolvedAt:
        status === TicketStatus.RESOLVED ? new Date() : ticket.resolvedAt,
    });

    this.logger.log(
      `Ticket ${ticket.id} moved ${ticket.status} -> ${status} by ${actor.id}`,
    );
    return this.toView(updated);
  }

  async assign(ticketId: string, agentId: string, requesterId: string) {
    const ticket = await this.loadTicket(ticketId);
    const agent = await this.directory.resolve(agentId);
    const requester = await this.directory.resolve(requesterId);

    if (!this.accessControl.isAgentOrAdmin(agent)) {
      throw new InvalidOperationException(`User ${agent.id} is not an agent`);
    }

    if (!this.accessControl.canAssignTickets(requester)) {
      throw new ForbiddenException(
        'You do not have permission to assign tickets',
      );
    }

    const nextStatus =
      ticket.status === TicketStatus.OPEN
        ? TicketStatus.IN_PROGRESS
        : ticket.status;

    const updated = await this.persist({
      ...ticket,
      assignedTo: agent.id,
      status: nextStatus,
    });

    this.logger.log(
      `Ticket ${ticket.id} assigned to ${agent.id} by ${requester.id}` +
        (nextStatus !== ticket.status
          ? ` (${ticket.status} -> ${nextStatus})`
          : ''),
    );
    return this.toView(updated);
  }

  async unassign(ticketId: string, requesterId: string) {
    const ticket = await this.loadTicket(ticketId);
    const requester = await this.directory.resolve(requesterId);

    if (!this.accessControl.canAssignTickets(requester)) {
      throw new ForbiddenException(
        'You do not have permission to unassign tickets',
      );
    }

    if (ticket.assignedTo === null) {
      throw new InvalidOperationException('Ticket is not assigned to anyone');
    }

    const nextStatus =
      ticket.status === TicketStatus.IN_PROGRESS
        ? TicketStatus.OPEN
        : ticket.status;

    const updated = await this.persist({
      ...ticket,
      assignedTo: null,
      status: nextStatus,
    });

    this.logger.log(
      `Ticket ${ticket.id} unassigned from ${ticket.assignedTo} by ${requester.id}`,
    );
    return this.toView(updated);
  }

  /** Changing priority restarts the SLA window from now, not from creation. */
  async updatePriority(
    ticketId: string,
    priority: TicketPriority,
    requesterId: string,
  ) {
    const ticket = await this.loadTicket(ticketId);
    const requester = await this.directory.resolve(requesterId);

    if (!this.accessControl.canModifyTicket(requester, ticket)) {
      throw new ForbiddenException(
        'You do not have permission to modify this ticket',
      );
    }

    const updated = await this.persist({
      ...ticket,
      priority,
      slaDeadline: computeDeadline(priority, new Date()),
    });

    this.logger.log(
      `Ticket ${ticket.id} priority ${ticket.priority} -> ${priority} by ${requester.id}`,
    );
    return this.toView(updated);
  }

  async listSlaBreached() {
    const now = new Date();
    const tickets = await this.store.scan({
      slaDeadlineBefore: now,
      statusNotIn: [TicketStatus.RESOLVED, TicketStatus.CLOSED],
    });

    return tickets
      .filter((ticket) => isSlaBreached(ticket, now))
      .sort(compareBreachUrgency)
      .map((ticket) => this.toView(ticket, now));
  }

  async remove(ticketId: string, actorId: string) {
    const ticket = await this.loadTicket(ticketId);
    const actor = await this.directory.resolve(actorId);

    if (!this.accessControl.canDeleteTickets(actor)) {
      throw new ForbiddenException('Only administrators can delete tickets');
    }

    await this.persist({ ...ticket, deletedAt: new Date() });
    this.logger.log(`Ticket ${ticket.id} soft-deleted by ${actor.id}`);
  }

  private async loadTicket(ticketId: string): Promise<Ticket> {
    const ticket = await this.store.findById(ticketId);
    if (!ticket) {
      throw new NotFoundException('Ticket not found');
    }
    return ticket;
  }

  private async persist(ticket: Ticket): Promise<Ticket> {
    const saved = await this.store.save(ticket);
    if (!saved) {
      this.logger.warn(
        `Ticket ${ticket.id} write rejected: version ${ticket.version} is stale`,
      );
      throw new TicketConflictException(ticket.id);
    }
    return saved;
  }

  private toView(ticket: Ticket, now = new Date()): TicketView {
    return {
      id: ticket.id,
      title: ticket.title,
      description: ticket.description,
      status: ticket.status,
      priority: ticket.priority,
      createdBy: ticket.createdBy,
      assignedTo: ticket.assignedTo,
      slaDeadline: ticket.slaDeadline,
      resolvedAt: ticket.resolvedAt,
      createdAt: ticket.createdAt,
      updatedAt: ticket.updatedAt,
      isSlaBreached: isSlaBreached(ticket, now),
    };
  }
}
