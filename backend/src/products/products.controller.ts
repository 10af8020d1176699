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
import { ProductsService } from './products.service';
import { CreateProductDto, UpdateProductDto } from './dto/product.dto';
import { Product } from '../entities/product.entity';
import { AuthenticatedRequest } from '../auth/authenticated-user';

export function toProductResponse(product: Product) {
  return {
    id: product.id,
    nom: product.name,
    reference: product.reference,
    description: product.description,
    prix_unitaire: Number(product.unitPrice),
    prix_vente: product.salePrice === null ? null : Number(product.salePrice),
    stock_actuel: product.stock,
    fournisseur_id: product.supplierId,
  };
}

@Controller('produits')
@UseGuards(AuthGuard('jwt'))
export class ProductsController {
  constructor(private productsService: ProductsService) {}

  @Get()
  async findAll() {
    const products = await this.productsService.findAll();
    return products.map(toProductResponse);
  }

  @Get(':id')
  async findOne(@Param('id', ParseIntPipe) id: number) {
    return toProductResponse(await this.productsService.findOne(id));
  }

  @Post()
  async create(@Body() dto: CreateProductDto, @Request() req: AuthenticatedRequest) {
    return toProductResponse(await this.productsService.create(dto, req.user.id));
  }

  @Put(':id')
  async update(
    @Param('id', ParseIntPipe) id: number,
    @Body() dto: UpdateProductDto,
    @Request() req: AuthenticatedRequest,
  ) {
    return toProductResponse(await this.productsService.update(id, dto, req.user.id));
  }

  @Delete(':id')
  async remove(@Param('id', ParseIntPipe) id: number, @Request() req: AuthenticatedRequest) {
    return this.productsService.remove(id, req.user.id);
  }
}
