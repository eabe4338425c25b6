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
import { PlayService } from '../../catalog/play.service';
import { JwtAuthGuard } from '../../common/guards/jwt-auth.guard';
import { StaffOrReadOnlyGuard } from '../../common/guards/staff-or-read-only.guard';
import {
  CATALOG_PAGE_LIMITS,
  PaginatedResponse,
  toPageRequest,
  toPaginatedResponse,
} from '../../common/pagination';
import {
  CreatePlayRequest,
  PlayDetailResponse,
  PlayListItemResponse,
  PlayListQuery,
  UpdatePlayRequest,
  toPlayDetailResponse,
  toPlayListItemResponse,
} from '../dto/play.dto';

@ApiTags('plays')
@ApiBearerAuth()
@UseGuards(JwtAuthGuard, StaffOrReadOnlyGuard)
@Controller('api/plays')
export class PlayController {
  constructor(private readonly playService: PlayService) {}

  @Get()
  async list(@Query() query: PlayListQuery): Promise<PaginatedResponse<PlayListItemResponse>> {
    const page = await this.playService.list(
      {
        title: query.title,
        genreIds: query.genres,
        genreName: query.genre,
        actorIds: query.actors,
      },
      toPageRequest(query, CATALOG_PAGE_LIMITS),
    );
    return toPaginatedResponse(page, toPlayListItemResponse);
  }

  @Get(':id')
  async get(@Param('id', ParseUUIDPipe) id: string): Promise<PlayDetailResponse> {
    return toPlayDetailResponse(await this.playService.get(id));
  }

  @Post()
  async create(@Body() body: CreatePlayRequest): Promise<PlayDetailResponse> {
    return toPlayDetailResponse(await this.playService.create(body));
  }

  @Patch(':id')
  async update(
    @Param('id', ParseUUIDPipe) id: string,
    @Body() body: UpdatePlayRequest,
  ): Promise<PlayDetailResponse> {
    return toPlayDetailResponse(await this.playService.update(id, body));
  }

  @Delete(':id')
  @HttpCode(HttpStatus.NO_CONTENT)
  async remove(@Param('id', ParseUUIDPipe) id: string): Promise<void> {
    await this.playService.remove(id);
  }
}
