import {
  Controller,
  Get,
  Post,
  Delete,
  Body,
  Param,
  ParseIntPipe,
  UseGuards,
  Request,
  HttpCode,
  HttpStatus,
} from '@nestjs/common';
import { AuthGuard } from '@nestjs/passport';
import { CartService } from './cart.service';
import { CartSessionStore } from './cart-session.store';
import { toCartResponse } from './cart-session';
import { AddCartItemDto, FinalizeCartDto } from './dto/cart.dto';
import { AuthenticatedRequest } from '../auth/authenticated-user';
import { toOrderResponse } from '../orders/order.transform';

@Controller('panier')
@UseGuards(AuthGuard('jwt'))
export class CartController {
  constructor(
    private cartService: CartService,
    private cartSessions: CartSessionStore,
  ) {}

  @Get()
  getCart(@Request() req: AuthenticatedRequest) {
    return toCartResponse(this.cartSessions.get(req.user.id));
  }

  @Post('articles')
  async addItem(@Body() dto: AddCartItemDto, @Request() req: AuthenticatedRequest) {
    const session = this.cartSessions.get(req.user.id);
    await this.cartService.addItem(session, dto);
    return toCartResponse(session);
  }

  @Delete('articles/:produitId')
  async removeItem(
    @Param('produitId', ParseIntPipe) produitId: number,
    @Request() req: AuthenticatedRequest,
  ) {
    const session = this.cartSessions.get(req.user.id);
    await this.cartService.removeItem(session, produitId);
    return toCartResponse(session);
  }

  @Delete()
  async clearCart(@Request() req: AuthenticatedRequest) {
    return this.cartService.clearCart(this.cartSessions.get(req.user.id));
  }

  @Post('finaliser')
  @HttpCode(HttpStatus.CREATED)
  async finalize(@Body() dto: FinalizeCartDto, @Request() req: AuthenticatedRequest) {
    const order = await this.cartService.finalize(this.cartSessions.get(req.user.id), dto);
    return toOrderResponse(order);
  }
}
