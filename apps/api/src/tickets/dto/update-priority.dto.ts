import { IsEnum } from 'class-validator';
import { TicketPriority } from '../ticket.types';

export class UpdatePriorityDto {
  @IsEnum(TicketPriority)
  priority!: TicketPriority;
}
