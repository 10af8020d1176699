import {
  Controller,
  Get,
  Post,
  Put,
  Delete,
  Body,
  Param,
  ParseIntPipe,
  UseGuards,
  Request,
} from '@nestjs/common';
import { AuthGuard } from '@nestjs/passport';
import { SuppliersService } from './suppliers.service';
import { CreateSupplierDto, UpdateSupplierDto } from './dto/supplier.dto';
import { Supplier } from '../entities/supplier.entity';
import { AuthenticatedRequest } from '../auth/authenticated-user';

export function toSupplierResponse(supplier: Supplier) {
  return {
    id: supplier.id,
    nom: supplier.name,
    contact: supplier.contact,
  };
}

@Controller('fournisseurs')
@UseGuards(AuthGuard('jwt'))
export class SuppliersController {
  constructor(private suppliersService: SuppliersService) {}

  @Get()
  async findAll() {
    const suppliers = await this.suppliersService.findAll();
    return suppliers.map(toSupplierResponse);
  }

  @Get(':id')
  async findOne(@Param('id', ParseIntPipe) id: number) {
    return toSupplierResponse(await this.suppliersService.findOne(id));
  }

  @Post()
  async create(@Body() dto: CreateSupplierDto, @Request() req: AuthenticatedRequest) {
    return toSupplierResponse(await this.suppliersService.create(dto, req.user.id));
  }

  @Put(':id')
  async update(
    @Param('id', ParseIntPipe) id: number,
    @Body() dto: UpdateSupplierDto,
    @Request() req: AuthenticatedRequest,
  ) {
    return toSupplierResponse(await this.suppliersService.update(id, dto, req.user.id));
  }

  @Delete(':id')
  async remove(@Param('id', ParseIntPipe) id: number, @Request() req: AuthenticatedRequest) {
    return this.suppliersService.remove(id, req.user.id);
  }
}
