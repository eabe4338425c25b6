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
import { TheatreHallService } from '../../catalog/theatre-hall.service';
import { JwtAuthGuard } from '../../common/guards/jwt-auth.guard';
import { StaffOrReadOnlyGuard } from '../../common/guards/staff-or-read-only.guard';
import {
  CATALOG_PAGE_LIMITS,
  PaginatedResponse,
  PaginationQuery,
  toPageRequest,
  toPaginatedResponse,
} from '../../common/pagination';
import {
  CreateTheatreHallRequest,
  TheatreHallResponse,
  UpdateTheatreHallRequest,
  toTheatreHallResponse,
} from '../dto/theatre-hall.dto';

@ApiTags('theatre-halls')
@ApiBearerAuth()
@UseGuards(JwtAuthGuard, StaffOrReadOnlyGuard)
@Controller('api/theatre-halls')
export class TheatreHallController {
  constructor(private readonly theatreHallService: TheatreHallService) {}

  @Get()
  async list(@Query() query: PaginationQuery): Promise<PaginatedResponse<TheatreHallResponse>> {
    const page = await this.theatreHallService.list(toPageRequest(query, CATALOG_PAGE_LIMITS));
    return toPaginatedResponse(page, toTheatreHallResponse);
  }

  @Get(':id')
  async get(@Param('id', ParseUUIDPipe) id: string): Promise<TheatreHallResponse> {
    return toTheatreHallResponse(await this.theatreHallService.get(id));
  }

  @Post()
  async create(@Body() body: CreateTheatreHallRequest): Promise<TheatreHallResponse> {
    return toTheatreHallResponse(await this.theatreHallService.create(body));
  }

  @Patch(':id')
  async update(
    @Param('id', ParseUUIDPipe) id: string,
    @Body() body: UpdateTheatreHallRequest,
  ): Promise<TheatreHallResponse> {
    return toTheatreHallResponse(await this.theatreHallService.update(id, body));
  }

  @Delete(':id')
  @HttpCode(HttpStatus.NO_CONTENT)
  async remove(@Param('id', ParseUUIDPipe) id: string): Promise<void> {
    await this.theatreHallService.remove(id);
  }
}
