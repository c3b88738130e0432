import { ForbiddenException, NotFoundException } from '@nestjs/common';
import { Test } from '@nestjs/testing';
import { InMemoryTicketStore } from '../../test/support/in-memory-ticket.store';
import { InMemoryUserDirectory } from '../../test/support/in-memory-user.directory';
import { AccessControlService } from '../common/access-control.service';
import {
  InvalidOperationException,
  InvalidTransitionException,
  TicketConflictException,
} from '../common/lifecycle.exceptions';
import { USER_DIRECTORY } from '../users/user-directory';
import { UserRole } from '../users/user.types';
import { TICKET_STORE } from './ticket-store';
import { TicketPriority, TicketStatus } from './ticket.types';
import { TicketsService } from './tickets.service';

const HOUR_MS = 60 * 60 * 1000;
const T0 = new Date('2026-03-02T09:00:00.000Z');

describe('TicketsService', () => {
  let service: TicketsService;
  let store: InMemoryTicketStore;

  beforeEach(async () => {
    store = new InMemoryTicketStore();
    const directory = new InMemoryUserDirectory();
    directory.add('customer-1', UserRole.CUSTOMER);
    directory.add('customer-2', UserRole.CUSTOMER);
    directory.add('agent-1', UserRole.AGENT);
    directory.add('agent-2', UserRole.AGENT);
    directory.add('admin-1', UserRole.ADMIN);

    const moduleRef = await Test.createTestingModule({
      providers: [
        TicketsService,
        AccessControlService,
        { provide: TICKET_STORE, useValue: store },
        { provide: USER_DIRECTORY, useValue: directory },
      ],
    }).compile();
    moduleRef.useLogger(false);

    service = moduleRef.get(TicketsService);
    jest.useFakeTimers({ now: T0, doNotFake: ['nextTick', 'queueMicrotask'] });
  });

  afterEach(() => {
    jest.useRealTimers();
  });

  const createTicket = (
    priority: TicketPriority = TicketPriority.MEDIUM,
    creatorId = 'customer-1',
  ) =>
    service.create(
      { title: 'Printer on fire', description: 'Third floor', priority },
      creatorId,
    );

  describe('create', () => {
    it('opens an unassigned ticket with a deadline from its priority', async () => {
      const ticket = await createTicket(TicketPriority.CRITICAL);

      expect(ticket.status).toBe(TicketStatus.OPEN);
      expect(ticket.assignedTo).toBeNull();
      expect(ticket.resolvedAt).toBeNull();
      expect(ticket.createdBy).toBe('customer-1');
      expect(ticket.slaDeadline).toEqual(new Date(T0.getTime() + 4 * HOUR_MS));
      expect(ticket.isSlaBreached).toBe(false);
    });

    it('defaults to MEDIUM priority', async () => {
      const ticket = await service.create(
        { title: 'VPN drops', description: 'Every hour' },
        'customer-1',
      );

      expect(ticket.priority).toBe(TicketPriority.MEDIUM);
      expect(ticket.slaDeadline).toEqual(
        new Date(T0.getTime() + 72 * HOUR_MS),
      );
    });

    it('rejects an unknown creator', async () => {
      await expect(createTicket(TicketPriority.LOW, 'ghost')).rejects.toThrow(
        NotFoundException,
      );
      expect(await store.scan({})).toEqual([]);
    });
  });

  describe('updatePriority', () => {
    it('restarts the SLA window from the time of the change', async () => {
      const created = await createTicket(TicketPriority.CRITICAL);
      const t1 = new Date(T0.getTime() + 2 * HOUR_MS);
      jest.setSystemTime(t1);

      const updated = await service.updatePriority(
        created.id,
        TicketPriority.LOW,
        'agent-1',
      );

      expect(updated.priority).toBe(TicketPriority.LOW);
      expect(updated.slaDeadline).toEqual(
        new Date(t1.getTime() + 168 * HOUR_MS),
      );
    });

    it('forbids agents on tickets assigned to someone else', async () => {
      const created = await createTicket();
      await service.assign(created.id, 'agent-2', 'agent-2');

      await expect(
        service.updatePriority(created.id, TicketPriority.HIGH, 'agent-1'),
      ).rejects.toThrow('You do not have permission to modify this ticket');
    });
  });

  describe('assign', () => {
    it('assigns an open ticket and moves it to IN_PROGRESS in one call', async () => {
      const created = await createTicket();

      const assigned = await service.assign(created.id, 'agent-1', 'admin-1');

      expect(assigned.assignedTo).toBe('agent-1');
      expect(assigned.status).toBe(TicketStatus.IN_PROGRESS);
    });

    it('refuses a customer as assignee and leaves the ticket unchanged', async () => {
      const created = await createTicket();

      await expect(
        service.assign(created.id, 'customer-2', 'agent-1'),
      ).rejects.toThrow(new InvalidOperationException('User customer-2 is not an agent'));

      const stored = await store.findById(created.id);
      expect(stored?.assignedTo).toBeNull();
      expect(stored?.status).toBe(TicketStatus.OPEN);
      expect(stored?.version).toBe(1);
    });

    it('forbids customers from assigning', async () => {
      const created = await createTicket();

      await expect(
        service.assign(created.id, 'agent-1', 'customer-1'),
      ).rejects.toThrow(ForbiddenException);
    });

    it('keeps the status of a resolved ticket', async () => {
      const created = await createTicket();
      await service.assign(created.id, 'agent-1', 'agent-1');
      await service.updateStatus(created.id, TicketStatus.RESOLVED, 'agent-1');

      const reassigned = await service.assign(created.id, 'agent-2', 'admin-1');

      expect(reassigned.status).toBe(TicketStatus.RESOLVED);
      expect(reassigned.assignedTo).toBe('agent-2');
    });
  });

  describe('unassign', () => {
    it('reverts an IN_PROGRESS ticket to OPEN', async () => {
      const created = await createTicket();
      await service.assign(created.id, 'agent-1', 'agent-1');

      const unassigned = await service.unassign(created.id, 'agent-1');

      expect(unassigned.assignedTo).toBeNull();
      expect(unassigned.status).toBe(TicketStatus.OPEN);
    });

    it('rejects a ticket that has no assignee', async () => {
      const created = await createTicket();

      await expect(service.unassign(created.id, 'agent-1')).rejects.toThrow(
        new InvalidOperationException('Ticket is not assigned to anyone'),
      );
    });

    it('forbids customers', async () => {
      const created = await createTicket();
      await service.assign(created.id, 'agent-1', 'agent-1');

      await expect(service.unassign(created.id, 'customer-1')).rejects.toThrow(
        'You do not have permission to unassign tickets',
      );
    });
  });

  describe('updateStatus', () => {
    it('requires an assignee before IN_PROGRESS, whoever asks', async () => {
      const created = await createTicket();

      for (const actor of ['customer-1', 'agent-1', 'admin-1']) {
        await expect(
          service.updateStatus(created.id, TicketStatus.IN_PROGRESS, actor),
        ).rejects.toThrow(InvalidOperationException);
      }
    });

    it('stamps resolvedAt when an agent resolves', async () => {
      const created = await createTicket();
      await service.assign(created.id, 'agent-1', 'agent-1');
      const resolvedAt = new Date(T0.getTime() + HOUR_MS);
      jest.setSystemTime(resolvedAt);

      const resolved = await service.updateStatus(
        created.id,
        TicketStatus.RESOLVED,
        'agent-1',
      );

      expect(resolved.status).toBe(TicketStatus.RESOLVED);
      expect(resolved.resolvedAt).toEqual(resolvedAt);
      expect(resolved.resolvedAt?.getTime()).toBeGreaterThanOrEqual(
        resolved.createdAt.getTime(),
      );
    });

    it('forbids a customer from resolving their own ticket', async () => {
      const created = await createTicket();
      await service.assign(created.id, 'agent-1', 'agent-1');

      await expect(
        service.updateStatus(created.id, TicketStatus.RESOLVED, 'customer-1'),
      ).rejects.toThrow(new ForbiddenException('Only agents can resolve tickets'));
    });

    it('rejects reopening a closed ticket', async () => {
      const created = await createTicket();
      await service.updateStatus(created.id, TicketStatus.CLOSED, 'customer-1');

      const attempt = service.updateStatus(
        created.id,
        TicketStatus.OPEN,
        'admin-1',
      );

      await expect(attempt).rejects.toThrow(
        'Invalid status transition from CLOSED to OPEN',
      );
      expect((await store.findById(created.id))?.status).toBe(
        TicketStatus.CLOSED,
      );
    });

    const ticketIn = async (status: TicketStatus) => {
      const created = await createTicket();
      if (status === TicketStatus.CLOSED) {
        return service.updateStatus(created.id, status, 'customer-1');
      }
      if (status === TicketStatus.OPEN) {
        return created;
      }
      const assigned = await service.assign(created.id, 'agent-1', 'agent-1');
      return status === TicketStatus.RESOLVED
        ? service.updateStatus(created.id, status, 'agent-1')
        : assigned;
    };

    it.each([
      [TicketStatus.OPEN, TicketStatus.OPEN],
      [TicketStatus.OPEN, TicketStatus.RESOLVED],
      [TicketStatus.IN_PROGRESS, TicketStatus.IN_PROGRESS],
      [TicketStatus.IN_PROGRESS, TicketStatus.CLOSED],
      [TicketStatus.RESOLVED, TicketStatus.OPEN],
      [TicketStatus.CLOSED, TicketStatus.IN_PROGRESS],
    ])('rejects %s -> %s before checking roles', async (from, to) => {
      const ticket = await ticketIn(from);
      expect(ticket.status).toBe(from);
      const before = await store.findById(ticket.id);

      const error = await service
        .updateStatus(ticket.id, to, 'customer-1')
        .catch((caught: unknown) => caught);

      expect(error).toBeInstanceOf(InvalidTransitionException);
      expect(error).toMatchObject({ from, to });
      expect(await store.findById(ticket.id)).toEqual(before);
    });

    it('returns to IN_PROGRESS from RESOLVED and re-stamps on the next resolve', async () => {
      const created = await createTicket();
      await service.assign(created.id, 'agent-1', 'agent-1');
      await service.updateStatus(created.id, TicketStatus.RESOLVED, 'agent-1');
      const reopened = await service.updateStatus(
        created.id,
        TicketStatus.IN_PROGRESS,
        'agent-1',
      );
      expect(reopened.resolvedAt).toEqual(T0);

      const later = new Date(T0.getTime() + 3 * HOUR_MS);
      jest.setSystemTime(later);
      const resolved = await service.updateStatus(
        created.id,
        TicketStatus.RESOLVED,
        'agent-1',
      );

      expect(resolved.resolvedAt).toEqual(later);
    });
  });

  describe('listSlaBreached', () => {
    it('lists overdue open work, most urgent first', async () => {
      const low = await createTicket(TicketPriority.LOW);
      const high = await createTicket(TicketPriority.HIGH);
      const critical = await createTicket(TicketPriority.CRITICAL);
      const resolved = await createTicket(TicketPriority.CRITICAL);
      const deleted = await createTicket(TicketPriority.CRITICAL);
      jest.setSystemTime(new Date(T0.getTime() + HOUR_MS));
      const laterCritical = await createTicket(TicketPriority.CRITICAL);

      await service.assign(resolved.id, 'agent-1', 'agent-1');
      await service.updateStatus(resolved.id, TicketStatus.RESOLVED, 'agent-1');
      await service.remove(deleted.id, 'admin-1');

      jest.setSystemTime(new Date(T0.getTime() + 25 * HOUR_MS));
      const breached = await service.listSlaBreached();

      expect(breached.map((ticket) => ticket.id)).toEqual([
        critical.id,
        laterCritical.id,
        high.id,
      ]);
      expect(breached.every((ticket) => ticket.isSlaBreached)).toBe(true);
      expect(breached.map((ticket) => ticket.id)).not.toContain(low.id);
    });
  });

  describe('concurrency', () => {
    it('turns a stale write into a conflict and keeps the stored ticket', async () => {
      const created = await createTicket();
      const stale = await store.findById(created.id);
      if (!stale) throw new Error('ticket missing');
      await service.assign(created.id, 'agent-1', 'agent-1');

      jest.spyOn(store, 'findById').mockResolvedValueOnce(stale);
      await expect(
        service.updatePriority(created.id, TicketPriority.CRITICAL, 'admin-1'),
      ).rejects.toThrow(TicketConflictException);

      const stored = await store.findById(created.id);
      expect(stored?.priority).toBe(TicketPriority.MEDIUM);
      expect(stored?.assignedTo).toBe('agent-1');
      expect(stored?.version).toBe(2);
    });
  });

  describe('remove', () => {
    it('soft-deletes so every later operation sees NotFound', async () => {
      const created = await createTicket();

      await service.remove(created.id, 'admin-1');

      expect(store.peek(created.id)?.deletedAt).toEqual(T0);
      await expect(service.getById(created.id, 'admin-1')).rejects.toThrow(
        new NotFoundException('Ticket not found'),
      );
      await expect(
        service.updateStatus(created.id, TicketStatus.CLOSED, 'admin-1'),
      ).rejects.toThrow(NotFoundException);
      await expect(
        service.assign(created.id, 'agent-1', 'admin-1'),
      ).rejects.toThrow(NotFoundException);
      await expect(service.remove(created.id, 'admin-1')).rejects.toThrow(
        NotFoundException,
      );
      expect(await service.list({}, 'admin-1')).toEqual([]);
    });

    it('is restricted to admins', async () => {
      const created = await createTicket();

      await expect(service.remove(created.id, 'agent-1')).rejects.toThrow(
        'Only administrators can delete tickets',
      );
    });
  });

  describe('getById', () => {
    it('hides other customers tickets', async () => {
      const created = await createTicket();

      await expect(service.getById(created.id, 'customer-2')).rejects.toThrow(
        ForbiddenException,
      );
      const view = await service.getById(created.id, 'agent-2');
      expect(view.id).toBe(created.id);
      expect(view).not.toHaveProperty('version');
      expect(view).not.toHaveProperty('deletedAt');
    });
  });

  describe('list', () => {
    it('scopes customers to their own tickets', async () => {
      const own = await createTicket(TicketPriority.LOW, 'customer-1');
      await createTicket(TicketPriority.LOW, 'customer-2');

      const listed = await service.list({}, 'customer-1');

      expect(listed.map((ticket) => ticket.id)).toEqual([own.id]);
      await expect(
        service.list({ scope: 'all' }, 'customer-1'),
      ).rejects.toThrow('Customers can only list their own tickets');
    });

    it('filters staff views by scope and status, newest first', async () => {
      const first = await createTicket(TicketPriority.LOW, 'customer-1');
      const second = await createTicket(TicketPriority.LOW, 'customer-2');
      const third = await createTicket(TicketPriority.LOW, 'customer-2');
      await service.assign(second.id, 'agent-1', 'agent-1');

      const all = await service.list({}, 'agent-1');
      const assigned = await service.list({ scope: 'assigned' }, 'agent-1');
      const unassigned = await service.list({ scope: 'unassigned' }, 'agent-2');
      const open = await service.list(
        { status: TicketStatus.OPEN },
        'admin-1',
      );

      expect(all.map((ticket) => ticket.id)).toEqual([
        third.id,
        second.id,
        first.id,
      ]);
      expect(assigned.map((ticket) => ticket.id)).toEqual([second.id]);
      expect(unassigned.map((ticket) => ticket.id)).toEqual([
        third.id,
        first.id,
      ]);
      expect(open.map((ticket) => ticket.id)).toEqual([third.id, first.id]);
    });
  });

  describe('updateDetails', () => {
    it('lets the creator edit title and description only', async () => {
      const created = await createTicket(TicketPriority.HIGH);

      const updated = await service.updateDetails(
        created.id,
        { title: 'Printer smoking' },
        'customer-1',
      );

      expect(updated.title).toBe('Printer smoking');
      expect(updated.description).toBe('Third floor');
      expect(updated.priority).toBe(TicketPriority.HIGH);
      expect(updated.slaDeadline).toEqual(created.slaDeadline);
    });

    it('rejects an empty update', async () => {
      const created = await createTicket();

      await expect(
        service.updateDetails(created.id, {}, 'customer-1'),
      ).rejects.toThrow(new InvalidOperationException('Nothing to update'));
    });

    it('forbids other customers', async () => {
      const created = await createTicket();

      await expect(
        service.updateDetails(created.id, { title: 'Mine now' }, 'customer-2'),
      ).rejects.toThrow(ForbiddenException);
    });
  });
});
