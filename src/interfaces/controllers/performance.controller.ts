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
  Query,
  UseGuards,
} from '@nestjs/common';
import { ApiBearerAuth, ApiTags } from '@nestjs/swagger';
import { PerformanceService } from '../../performance/performance.service';
import { SeatPosition } from '../../catalog/domain/theatre-hall.entity';
import { JwtAuthGuard } from '../../common/guards/jwt-auth.guard';
import { StaffOrReadOnlyGuard } from '../../common/guards/staff-or-read-only.guard';
import {
  CATALOG_PAGE_LIMITS,
  PaginatedResponse,
  toPageRequest,
  toPaginatedResponse,
} from '../../common/pagination';
import {
  CreatePerformanceRequest,
  PerformanceDetailResponse,
  PerformanceListItemResponse,
  PerformanceListQuery,
  PerformanceResponse,
  UpdatePerformanceRequest,
  toPerformanceDetailResponse,
  toPerformanceListItemResponse,
  toPerformanceResponse,
} from '../dto/performance.dto';

@ApiTags('performances')
@ApiBearerAuth()
@UseGuards(JwtAuthGuard, StaffOrReadOnlyGuard)
@Controller('api/performances')
export class PerformanceController {
  constructor(private readonly performanceService: PerformanceService) {}

  @Get()
  async list(
    @Query() query: PerformanceListQuery,
  ): Promise<PaginatedResponse<PerformanceListItemResponse>> {
    const page = await this.performanceService.list(
      {
        date: query.date,
        from: query.from,
        to: query.to,
        playId: query.play,
        theatreHallId: query.theatreHall,
      },
      toPageRequest(query, CATALOG_PAGE_LIMITS),
    );
    return toPaginatedResponse(page, toPerformanceListItemResponse);
  }

  @Get(':id')
  async get(@Param('id', ParseUUIDPipe) id: string): Promise<PerformanceDetailResponse> {
    return toPerformanceDetailResponse(await this.performanceService.get(id));
  }

  @Get(':id/seats')
  async getAvailableSeats(
    @Param('id', ParseUUIDPipe) id: string,
  ): Promise<{ seats: SeatPosition[] }> {
    return { seats: await this.performanceService.listAvailableSeats(id) };
  }

  @Post()
  async create(@Body() body: CreatePerformanceRequest): Promise<PerformanceResponse> {
    return toPerformanceResponse(await this.performanceService.create(body));
  }

  @Patch(':id')
  async update(
    @Param('id', ParseUUIDPipe) id: string,
    @Body() body: UpdatePerformanceRequest,
  ): Promise<PerformanceResponse> {
    return toPerformanceResponse(await this.performanceService.update(id, body));
  }

  @Delete(':id')
  @HttpCode(HttpStatus.NO_CONTENT)
  async remove(@Param('id', ParseUUIDPipe) id: string): Promise<void> {
    await this.performanceService.remove(id);
  }
}
