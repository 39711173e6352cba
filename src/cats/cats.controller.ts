import {
  Body,
  Controller,
  Delete,
  Get,
  HttpCode,
  HttpStatus,
  Param,
  Patch,
  Post,
  Put,
  Query,
} from '@nestjs/common';
import { AdoptionRequest } from './adoption/adoption';
import { CatIdPipe } from './cat-id.pipe';
import { CatsService } from './cats.service';
import { AdoptCatPipe } from './dto/adopt-cat.pipe';
import { toCatCandidate } from './dto/cat-candidate';
import { CreateCatDto } from './dto/create-cat.dto';
import { UpdateCatDto } from './dto/update-cat.dto';
import { CatFilters } from './query/cat-filters';
import { CatFiltersPipe } from './query/cat-filters.pipe';
import { CatStatisticsService } from './statistics/cat-statistics.service';
import {
  BreedStatistics,
  CatDetail,
  CatListItem,
  CatSearchResult,
  CatStatistics,
  toCatDetail,
  toCatListItem,
} from './views/cat.views';

@Controller('cats')
export class CatsController {
  constructor(
    private readonly catsService: CatsService,
    private readonly statisticsService: CatStatisticsService,
  ) {}

  @Get()
  async findAll(@Query(CatFiltersPipe) filters: CatFilters): Promise<CatListItem[]> {
    const cats = await this.catsService.findAll(filters);
    return cats.map(toCatListItem);
  }

  @Post()
  async create(@Body() createCatDto: CreateCatDto) {
    const cat = await this.catsService.create(toCatCandidate(createCatDto));
    return {
      status: 'success',
      message: `Cat "${cat.name}" has been successfully added to the database`,
      cat: toCatDetail(cat),
    };
  }

  // Collection routes come before ':id' so Express matches them first.

  @Get('available')
  async available(@Query(CatFiltersPipe) filters: CatFilters): Promise<CatListItem[]> {
    const cats = await this.catsService.findAvailable(filters);
    return cats.map(toCatListItem);
  }

  @Get('adopted')
  async adopted(@Query(CatFiltersPipe) filters: CatFilters): Promise<CatListItem[]> {
    const cats = await this.catsService.findAdopted(filters);
    return cats.map(toCatListItem);
  }

  @Get('statistics')
  statistics(): Promise<CatStatistics> {
    return this.statisticsService.globalStatistics();
  }

  @Get('breeds')
  breeds(): Promise<BreedStatistics[]> {
    return this.statisticsService.breedStatistics();
  }

  @Get('search')
  async search(@Query(CatFiltersPipe) filters: CatFilters): Promise<CatSearchResult> {
    const { cats, count } = await this.catsService.search(filters);
    return { count, results: cats.map(toCatListItem) };
  }

  @Get(':id')
  async findOne(@Param('id', CatIdPipe) id: number): Promise<CatDetail> {
    return toCatDetail(await this.catsService.findOne(id));
  }

  @Put(':id')
  async replace(
    @Param('id', CatIdPipe) id: number,
    @Body() createCatDto: CreateCatDto,
  ): Promise<CatDetail> {
    return toCatDetail(await this.catsService.update(id, toCatCandidate(createCatDto)));
  }

  @Patch(':id')
  async update(
    @Param('id', CatIdPipe) id: number,
    @Body() updateCatDto: UpdateCatDto,
  ): Promise<CatDetail> {
    return toCatDetail(await this.catsService.update(id, toCatCandidate(updateCatDto)));
  }

  @Delete(':id')
  @HttpCode(HttpStatus.NO_CONTENT)
  remove(@Param('id', CatIdPipe) id: number): Promise<void> {
    return this.catsService.remove(id);
  }

  @Post(':id/adopt')
  @HttpCode(HttpStatus.OK)
  async adopt(
    @Param('id', CatIdPipe) id: number,
    @Body(AdoptCatPipe) request: AdoptionRequest,
  ) {
    const cat = await this.catsService.adopt(id, request);
    return {
      message: `${cat.name} has been successfully adopted by ${cat.ownerName}!`,
      cat: toCatDetail(cat),
    };
  }

  @Post(':id/return_to_shelter')
  @HttpCode(HttpStatus.OK)
  async returnToShelter(@Param('id', CatIdPipe) id: number) {
    const { cat, formerOwner } = await this.catsService.returnToShelter(id);
    return {
      message: `${cat.name} has been returned to the shelter`,
      former_owner: formerOwner,
      cat: toCatDetail(cat),
    };
  }
}
