import { Module } from '@nestjs/common';
import { PgTicketStore } from './pg-ticket.store';
import { TICKET_STORE } from './ticket-store';
import { TicketsController } from './tickets.controller';
import { TicketsService } from './tickets.service';

@Module({
  controllers: [TicketsController],
  providers: [
    TicketsService,
    PgTicketStore,
    { provide: TICKET_STORE, useExisting: PgTicketStore },
  ],
  exports: [TicketsService],
})
export class TicketsModule {}
