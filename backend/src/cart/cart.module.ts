import { Module } from '@nestjs/common';
import { CartController } from './cart.controller';
import { CartService } from './cart.service';
import { CartSessionStore } from './cart-session.store';
import { ProductsModule } from '../products/products.module';
import { OrdersModule } from '../orders/orders.module';
import { AuditModule } from '../audit/audit.module';

@Module({
  imports: [ProductsModule, OrdersModule, AuditModule],
  controllers: [CartController],
  providers: [CartService, CartSessionStore],
  exports: [CartService, CartSessionStore],
})
export class CartModule {}
