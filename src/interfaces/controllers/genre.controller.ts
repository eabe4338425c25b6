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
import { GenreService } from '../../catalog/genre.service';
import { JwtAuthGuard } from '../../common/guards/jwt-auth.guard';
import { StaffOrReadOnlyGuard } from '../../common/guards/staff-or-read-only.guard';
import {
  CATALOG_PAGE_LIMITS,
  PaginatedResponse,
  toPageRequest,
  toPaginatedResponse,
} from '../../common/pagination';
import {
  CreateGenreRequest,
  GenreListQuery,
  GenreResponse,
  UpdateGenreRequest,
  toGenreResponse,
} from '../dto/genre.dto';

@ApiTags('genres')
@ApiBearerAuth()
@UseGuards(JwtAuthGuard, StaffOrReadOnlyGuard)
@Controller('api/genres')
export class GenreController {
  constructor(private readonly genreService: GenreService) {}

  @Get()
  async list(@Query() query: GenreListQuery): Promise<PaginatedResponse<GenreResponse>> {
    const page = await this.genreService.list(
      { name: query.name },
      toPageRequest(query, CATALOG_PAGE_LIMITS),
    );
    return toPaginatedResponse(page, toGenreResponse);
  }

  @Get(':id')
  async get(@Param('id', ParseUUIDPipe) id: string): Promise<GenreResponse> {
    return toGenreResponse(await this.genreService.get(id));
  }

  @Post()
  async create(@Body() body: CreateGenreRequest): Promise<GenreResponse> {
    return toGenreResponse(await this.genreService.create(body));
  }

  @Patch(':id')
  async update(
    @Param('id', ParseUUIDPipe) id: string,
    @Body() body: UpdateGenreRequest,
  ): Promise<GenreResponse> {
    return toGenreResponse(await this.genreService.update(id, body));
  }

  @Delete(':id')
  @HttpCode(HttpStatus.NO_CONTENT)
  async remove(@Param('id', ParseUUIDPipe) id: string): Promise<void> {
    await this.genreService.remove(id);
  }
}
