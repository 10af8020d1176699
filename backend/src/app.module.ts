import { Module } from '@nestjs/common';
import { ConfigModule, ConfigService } from '@nestjs/config';
import { TypeOrmModule } from '@nestjs/typeorm';
import { AppController } from './app.controller';
import { AuthModule } from './auth/auth.module';
import { UsersModule } from './users/users.module';
import { AuditModule } from './audit/audit.module';
import { SuppliersModule } from './suppliers/suppliers.module';
import { ProductsModule } from './products/products.module';
import { OrdersModule } from './orders/orders.module';
import { CartModule } from './cart/cart.module';
import { StatisticsModule } from './statistics/statistics.module';
import { ChargesModule } from './charges/charges.module';
import { buildDataSourceOptions, parseBoolean } from './config/database.config';

@Module({
  imports: [
    ConfigModule.forRoot({
      isGlobal: true,
      envFilePath: '.env',
    }),
    TypeOrmModule.forRootAsync({
      imports: [ConfigModule],
      useFactory: (configService: ConfigService) =>
        buildDataSourceOptions(
          configService.get<string>('DATABASE_URL'),
          parseBoolean(configService.get<string>('DB_SYNCHRONIZE'), true),
        ),
      inject: [ConfigService],
    }),
    AuthModule,
    UsersModule,
    AuditModule,
    SuppliersModule,
    ProductsModule,
    OrdersModule,
    CartModule,
    StatisticsModule,
    ChargesModule,
  ],
  controllers: [AppController],
})
export class AppModule { }
