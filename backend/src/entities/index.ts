import { Product } from './product.entity';
import { Supplier } from './supplier.entity';
import { Order } from './order.entity';
import { OrderLine } from './order-line.entity';
import { Charge } from './charge.entity';
import { User } from './user.entity';
import { AuditLog } from './audit-log.entity';

// Every entity registered with the data source
export const ENTITIES = [Product, Supplier, Order, OrderLine, Charge, User, AuditLog];
