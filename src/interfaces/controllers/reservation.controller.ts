import {
  Body,
  Controller,
  Delete,
  Get,
  HttpCode,
  HttpStatus,
  Param,
  ParseUUIDPipe,
  Post,
  Query,
  UseGuards,
} from '@nestjs/common';
import { ApiBearerAuth, ApiTags } from '@nestjs/swagger';
import { ReservationService } from '../../reservation/reservation.service';
import { JwtAuthGuard } from '../../common/guards/jwt-auth.guard';
import { AuthenticatedUser, CurrentUser } from '../../common/decorators/current-user.decorator';
import {
  PaginatedResponse,
  PaginationQuery,
  RESERVATION_PAGE_LIMITS,
  toPageRequest,
  toPaginatedResponse,
} from '../../common/pagination';
import {
  CreateReservationRequest,
  ReservationResponse,
  TicketListQuery,
  TicketResponse,
  toReservationResponse,
  toTicketResponse,
} from '../dto/reservation.dto';

@ApiTags('reservations')
@ApiBearerAuth()
@UseGuards(JwtAuthGuard)
@Controller('api')
export class ReservationController {
  constructor(private readonly reservationService: ReservationService) {}

  @Post('reservations')
  async create(
    @CurrentUser() user: AuthenticatedUser,
    @Body() body: CreateReservationRequest,
  ): Promise<ReservationResponse> {
    const created = await this.reservationService.createReservation(user.id, body.tickets);
    return toReservationResponse(
      await this.reservationService.getReservation(user.id, created.id),
    );
  }

  @Get('reservations')
  async list(
    @CurrentUser() user: AuthenticatedUser,
    @Query() query: PaginationQuery,
  ): Promise<PaginatedResponse<ReservationResponse>> {
    const page = await this.reservationService.listReservations(
      user.id,
      toPageRequest(query, RESERVATION_PAGE_LIMITS),
    );
    return toPaginatedResponse(page, toReservationResponse);
  }

  @Get('reservations/:id')
  async get(
    @CurrentUser() user: AuthenticatedUser,
    @Param('id', ParseUUIDPipe) id: string,
  ): Promise<ReservationResponse> {
    return toReservationResponse(await this.reservationService.getReservation(user.id, id));
  }

  @Delete('reservations/:id')
  @HttpCode(HttpStatus.NO_CONTENT)
  async cancel(
    @CurrentUser() user: AuthenticatedUser,
    @Param('id', ParseUUIDPipe) id: string,
  ): Promise<void> {
    await this.reservationService.cancelReservation(user.id, id);
  }

  @Get('tickets')
  async listTickets(
    @CurrentUser() user: AuthenticatedUser,
    @Query() query: TicketListQuery,
  ): Promise<{ tickets: TicketResponse[] }> {
    const tickets = await this.reservationService.listTickets(user.id, {
      performanceId: query.performance,
    });
    return { tickets: tickets.map(toTicketResponse) };
  }
}
