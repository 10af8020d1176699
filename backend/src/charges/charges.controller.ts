import {
  Controller,
  Get,
  Post,
  Put,
  Delete,
  Body,
  Param,
  Query,
  ParseIntPipe,
  UseGuards,
  Request,
} from '@nestjs/common';
import { AuthGuard } from '@nestjs/passport';
import { ChargesService, toDateOnly } from './charges.service';
import { CreateChargeDto, UpdateChargeDto } from './dto/charge.dto';
import { Charge } from '../entities/charge.entity';
import { AuthenticatedRequest } from '../auth/authenticated-user';

function toChargeResponse(charge: Charge) {
  return {
    id: charge.id,
    nature: charge.nature,
    montant: Number(charge.amount),
    date: toDateOnly(charge.chargeDate),
  };
}

@Controller('charges')
@UseGuards(AuthGuard('jwt'))
export class ChargesController {
  constructor(private chargesService: ChargesService) {}

  @Get()
  async findAll(@Query('limit') limit?: string) {
    const charges = await this.chargesService.findAll(limit ? parseInt(limit, 10) : undefined);
    return charges.map(toChargeResponse);
  }

  @Get(':id')
  async findOne(@Param('id', ParseIntPipe) id: number) {
    return toChargeResponse(await this.chargesService.findOne(id));
  }

  @Post()
  async create(@Body() dto: CreateChargeDto, @Request() req: AuthenticatedRequest) {
    return toChargeResponse(await this.chargesService.create(dto, req.user.id));
  }

  @Put(':id')
  async update(
    @Param('id', ParseIntPipe) id: number,
    @Body() dto: UpdateChargeDto,
    @Request() req: AuthenticatedRequest,
  ) {
    return toChargeResponse(await this.chargesService.update(id, dto, req.user.id));
  }

  @Delete(':id')
  async remove(@Param('id', ParseIntPipe) id: number, @Request() req: AuthenticatedRequest) {
    return this.chargesService.remove(id, req.user.id);
  }
}
