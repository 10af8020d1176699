import { Module } from '@nestjs/common';
import { TypeOrmModule } from '@nestjs/typeorm';
import { StatisticsController } from './statistics.controller';
import { StatisticsService } from './statistics.service';
import { OrderLine } from '../entities/order-line.entity';

@Module({
  imports: [TypeOrmModule.forFeature([OrderLine])],
  controllers: [StatisticsController],
  providers: [StatisticsService],
})
export class StatisticsModule {}
