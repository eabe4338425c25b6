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
import { ActorService } from '../../catalog/actor.service';
import { JwtAuthGuard } from '../../common/guards/jwt-auth.guard';
import { StaffOrReadOnlyGuard } from '../../common/guards/staff-or-read-only.guard';
import {
  CATALOG_PAGE_LIMITS,
  PaginatedResponse,
  toPageRequest,
  toPaginatedResponse,
} from '../../common/pagination';
import {
  ActorListQuery,
  ActorResponse,
  CreateActorRequest,
  UpdateActorRequest,
  toActorResponse,
} from '../dto/actor.dto';

@ApiTags('actors')
@ApiBearerAuth()
@UseGuards(JwtAuthGuard, StaffOrReadOnlyGuard)
@Controller('api/actors')
export class ActorController {
  constructor(private readonly actorService: ActorService) {}

  @Get()
  async list(@Query() query: ActorListQuery): Promise<PaginatedResponse<ActorResponse>> {
    const page = await this.actorService.list(
      { name: query.name },
      toPageRequest(query, CATALOG_PAGE_LIMITS),
    );
    return toPaginatedResponse(page, toActorResponse);
  }

  @Get(':id')
  async get(@Param('id', ParseUUIDPipe) id: string): Promise<ActorResponse> {
    return toActorResponse(await this.actorService.get(id));
  }

  @Post()
  async create(@Body() body: CreateActorRequest): Promise<ActorResponse> {
    return toActorResponse(await this.actorService.create(body));
  }

  @Patch(':id')
  async update(
    @Param('id', ParseUUIDPipe) id: string,
    @Body() body: UpdateActorRequest,
  ): Promise<ActorResponse> {
    return toActorResponse(await this.actorService.update(id, body));
  }

  @Delete(':id')
  @HttpCode(HttpStatus.NO_CONTENT)
  async remove(@Param('id', ParseUUIDPipe) id: string): Promise<void> {
    await this.actorService.remove(id);
  }
}
