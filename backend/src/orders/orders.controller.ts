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
import { OrdersService } from './orders.service';
import { CreateOrderDto, UpdateOrderDto } from './dto/order.dto';
import { toOrderResponse } from './order.transform';
import { AuthenticatedRequest } from '../auth/authenticated-user';

@Controller('commandes')
@UseGuards(AuthGuard('jwt'))
export class OrdersController {
  constructor(private ordersService: OrdersService) {}

  @Get()
  async findAll(@Request() req: AuthenticatedRequest) {
    const orders = await this.ordersService.findAll(req.user);
    return orders.map(toOrderResponse);
  }

  @Get(':id')
  async findOne(@Param('id', ParseIntPipe) id: number, @Request() req: AuthenticatedRequest) {
    return toOrderResponse(await this.ordersService.findOne(id, req.user));
  }

  @Post()
  async create(@Body() dto: CreateOrderDto, @Request() req: AuthenticatedRequest) {
    return toOrderResponse(await this.ordersService.create(dto, req.user.id));
  }

  @Put(':id')
  async update(
    @Param('id', ParseIntPipe) id: number,
    @Body() dto: UpdateOrderDto,
    @Request() req: AuthenticatedRequest,
  ) {
    return toOrderResponse(await this.ordersService.update(id, dto, req.user));
  }

  @Delete(':id')
  async remove(@Param('id', ParseIntPipe) id: number, @Request() req: AuthenticatedRequest) {
    return this.ordersService.remove(id, req.user);
  }
}
