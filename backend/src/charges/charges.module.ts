import { Module } from '@nestjs/common';
import { TypeOrmModule } from '@nestjs/typeorm';
import { ChargesController } from './charges.controller';
import { ChargesService } from './charges.service';
import { Charge } from '../entities/charge.entity';
import { AuditModule } from '../audit/audit.module';

@Module({
  imports: [TypeOrmModule.forFeature([Charge]), AuditModule],
  controllers: [ChargesController],
  providers: [ChargesService],
})
export class ChargesModule {}
