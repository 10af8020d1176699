import { INestApplication } from '@nestjs/common';
import { Test } from '@nestjs/testing';
import request from 'supertest';
import { DataSource } from 'typeorm';
import { AppModule } from '../../src/app.module';
import { configureApp } from '../../src/app.setup';
import { UsersService } from '../../src/users/users.service';
import { User, UserRole } from '../../src/entities/user.entity';
import { Product } from '../../src/entities/product.entity';
import { Supplier } from '../../src/entities/supplier.entity';

export async function createTestApp(): Promise<INestApplication> {
  const moduleRef = await Test.createTestingModule({
    imports: [AppModule],
  }).compile();

  const app = moduleRef.createNestApplication({ logger: false });
  configureApp(app);
  await app.init();
  return app;
}

export function authHeader(token: string) {
  return { Authorization: `Bearer ${token}` };
}

export async function createUser(
  app: INestApplication,
  username: string,
  role: UserRole = UserRole.CLIENT,
  password = 'test-password',
): Promise<User> {
  return app.get(UsersService).create(username, password, { role, isActive: true });
}

export async function login(app: INestApplication, username: string, password = 'test-password'): Promise<string> {
  const res = await request(app.getHttpServer())
    .post('/auth/login')
    .send({ username, password })
    .expect(200);

  return res.body.access_token;
}

// Crée un compte actif et renvoie son jeton
export async function createUserAndLogin(
  app: INestApplication,
  username: string,
  role: UserRole = UserRole.CLIENT,
): Promise<string> {
  await createUser(app, username, role);
  return login(app, username);
}

export async function createTestSupplier(app: INestApplication, name = 'Informatique Distribution'): Promise<Supplier> {
  const repository = app.get(DataSource).getRepository(Supplier);
  return repository.save(repository.create({ name, contact: 'ventes@fournisseur.example' }));
}

export async function createTestProduct(
  app: INestApplication,
  overrides: Partial<Pick<Product, 'name' | 'reference' | 'unitPrice' | 'stock' | 'supplierId'>> = {},
): Promise<Product> {
  const repository = app.get(DataSource).getRepository(Product);
  return repository.save(repository.create({
    name: 'Ordinateur portable',
    reference: 'ORD-001',
    unitPrice: 500,
    stock: 10,
    ...overrides,
  }));
}

export async function stockOf(app: INestApplication, productId: number): Promise<number> {
  const product = await app.get(DataSource).getRepository(Product).findOneByOrFail({ id: productId });
  return product.stock;
}
