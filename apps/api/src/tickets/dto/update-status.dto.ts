import { IsEnum } from 'class-validator';
import { TicketStatus } from '../ticket.types';

export class UpdateStatusDto {
  @IsEnum(TicketStatus)
  status!: TicketStatus;
}
