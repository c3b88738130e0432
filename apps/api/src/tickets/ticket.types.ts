export const TicketStatus = {
  OPEN: 'OPEN',
  IN_PROGRESS: 'IN_PROGRESS',
  RESOLVED: 'RESOLVED',
  CLOSED: 'CLOSED',
} as const;

export type TicketStatus = (typeof TicketStatus)[keyof typeof TicketStatus];

export const TicketPriority = {
  CRITICAL: 'CRITICAL',
  HIGH: 'HIGH',
  MEDIUM: 'MEDIUM',
  LOW: 'LOW',
} as const;

export type TicketPriority =
  (typeof TicketPriority)[keyof typeof TicketPriority];

export type Ticket = {
  id: string;
  title: string;
  description: string;
  status: TicketStatus;
  priority: TicketPriority;
  createdBy: string;
  assignedTo: string | null;
  slaDeadline: Date;
  resolvedAt: Date | null;
  /** Optimistic concurrency token; bumped by the store on every accepted write. */
  version: number;
  createdAt: Date;
  updatedAt: Date;
  deletedAt: Date | null;
};

/** Fields the engine supplies on creation; the store stamps the rest. */
export type NewTicket = Pick<
  Ticket,
  'title' | 'description' | 'priority' | 'createdBy' | 'slaDeadline'
> & {
  status: typeof TicketStatus.OPEN;
};

export type TicketView = Omit<Ticket, 'deletedAt' | 'version'> & {
  isSlaBreached: boolean;
};
