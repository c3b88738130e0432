import { IsEnum, IsIn, IsOptional } from 'class-validator';
import { TicketStatus } from '../ticket.types';

export const TICKET_SCOPES = ['all', 'created', 'assigned', 'unassigned'] as const;

export class ListTicketsDto {
  @IsOptional()
  @IsEnum(TicketStatus)
  status?: TicketStatus;

  /** Customers may only use 'created', which is also their default. */
  @IsOptional()
  @IsIn([...TICKET_SCOPES])
  scope?: (typeof TICKET_SCOPES)[number];
}
