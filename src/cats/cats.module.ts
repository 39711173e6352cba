import { Module } from '@nestjs/common';
import { TypeOrmModule } from '@nestjs/typeorm';
import { CatsController } from './cats.controller';
import { CatsSeeder } from './cats.seeder';
import { CatsService } from './cats.service';
import { Cat } from './entities/cat.entity';
import { CatStatisticsService } from './statistics/cat-statistics.service';

@Module({
  imports: [TypeOrmModule.forFeature([Cat])],
  controllers: [CatsController],
  providers: [CatsService, CatStatisticsService, CatsSeeder],
  exports: [CatsService, CatStatisticsService],
})
export class CatsModule {}
