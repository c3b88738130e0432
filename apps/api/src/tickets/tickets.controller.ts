import {
  Body,
  Controller,
  Delete,
  Get,
  HttpCode,
  HttpStatus,
  Param,
  ParseUUIDPipe,
  Patch,
  Post,
  Put,
  Query,
  UseGuards,
} from '@nestjs/common';
import { AgentOrAdminGuard } from '../auth/agent-or-admin.guard';
import { CurrentUser, type AuthUser } from '../auth/current-user.decorator';
import { AssignTicketDto } from './dto/assign-ticket.dto';
import { CreateTicketDto } from './dto/create-ticket.dto';
import { ListTicketsDto } from './dto/list-tickets.dto';
import { UpdatePriorityDto } from './dto/update-priority.dto';
import { UpdateStatusDto } from './dto/update-status.dto';
import { UpdateTicketDto } from './dto/update-ticket.dto';
import { TicketsService } from './tickets.service';

@Controller('tickets')
export class TicketsController {
  constructor(private readonly ticketsService: TicketsService) {}

  @Get()
  async list(@Query() query: ListTicketsDto, @CurrentUser() user: AuthUser) {
    return this.ticketsService.list(query, user.id);
  }

  @Get('sla-breached')
  @UseGuards(AgentOrAdminGuard)
  async listSlaBreached() {
    return this.ticketsService.listSlaBreached();
  }

  @Get(':id')
  async getById(
    @Param('id', ParseUUIDPipe) id: string,
    @CurrentUser() user: AuthUser,
  ) {
    return this.ticketsService.getById(id, user.id);
  }

  @Post()
  async create(@Body() payload: CreateTicketDto, @CurrentUser() user: AuthUser) {
    return this.ticketsService.create(payload, user.id);
  }

  @Patch(':id')
  async update(
    @Param('id', ParseUUIDPipe) id: string,
    @Body() payload: UpdateTicketDto,
    @CurrentUser() user: AuthUser,
  ) {
    return this.ticketsService.updateDetails(id, payload, user.id);
  }

  @Put(':id/status')
  async updateStatus(
    @Param('id', ParseUUIDPipe) id: string,
    @Body() payload: UpdateStatusDto,
    @CurrentUser() user: AuthUser,
  ) {
    return this.ticketsService.updateStatus(id, payload.status, user.id);
  }

  @Put(':id/assign')
  async assign(
    @Param('id', ParseUUIDPipe) id: string,
    @Body() payload: AssignTicketDto,
    @CurrentUser() user: AuthUser,
  ) {
    return this.ticketsService.assign(id, payload.agentId, user.id);
  }

  @Put(':id/unassign')
  async unassign(
    @Param('id', ParseUUIDPipe) id: string,
    @CurrentUser() user: AuthUser,
  ) {
    return this.ticketsService.unassign(id, user.id);
  }

  @Put(':id/priority')
  async updatePriority(
    @Param('id', ParseUUIDPipe) id: string,
    @Body() payload: UpdatePriorityDto,
    @CurrentUser() user: AuthUser,
  ) {
    return this.ticketsService.updatePriority(id, payload.priority, user.id);
  }

  @Delete(':id')
  @HttpCode(HttpStatus.NO_CONTENT)
  async remove(
    @Param('id', ParseUUIDPipe) id: string,
    @CurrentUser() user: AuthUser,
  ) {
    await this.ticketsService.remove(id, user.id);
  }
}
