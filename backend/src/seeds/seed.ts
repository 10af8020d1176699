import 'reflect-metadata';
import { Logger } from '@nestjs/common';
import { DataSource } from 'typeorm';
import * as bcrypt from 'bcrypt';
import * as dotenv from 'dotenv';
import { User, UserRole } from '../entities/user.entity';
import { Supplier } from '../entities/supplier.entity';
import { Product } from '../entities/product.entity';
import { buildDataSourceOptions, parseBoolean } from '../config/database.config';

dotenv.config();

const logger = new Logger('Seed');

const dataSource = new DataSource(
  buildDataSourceOptions(process.env.DATABASE_URL, parseBoolean(process.env.DB_SYNCHRONIZE, true)),
);

async function seed() {
  logger.log('Démarrage du seed...');

  await dataSource.initialize();
  logger.log('Connexion à la base de données établie');

  try {
    const userRepo = dataSource.getRepository(User);
    const supplierRepo = dataSource.getRepository(Supplier);
    const productRepo = dataSource.getRepository(Product);

    // Check if data already exists
    const existingUsers = await userRepo.count();
    if (existingUsers > 0) {
      logger.warn('Des données existent déjà. Seed annulé.');
      return;
    }

    const adminPassword = process.env.ADMIN_PASSWORD;
    if (!adminPassword) {
      throw new Error('ADMIN_PASSWORD doit être défini pour créer le compte administrateur');
    }
    const rounds = parseInt(process.env.BCRYPT_ROUNDS || '10', 10);

    const admin = userRepo.create({
      username: process.env.ADMIN_USERNAME || 'admin',
      passwordHash: await bcrypt.hash(adminPassword, rounds),
      role: UserRole.ADMIN,
      isActive: true,
    });
    await userRepo.save(admin);
    logger.log(`Administrateur ${admin.username} créé`);

    const [informatique, bureautique] = await supplierRepo.save([
      supplierRepo.create({ name: 'Informatique Distribution', contact: 'ventes@informatique.example' }),
      supplierRepo.create({ name: 'Bureau Fournitures', contact: '01 23 45 67 89' }),
    ]);
    logger.log('2 fournisseurs créés');

    await productRepo.save([
      productRepo.create({
        name: 'Ordinateur portable',
        reference: 'ORD-001',
        unitPrice: 500,
        salePrice: 650,
        stock: 10,
        supplierId: informatique.id,
      }),
      productRepo.create({
        name: 'Souris sans fil',
        reference: 'SOU-001',
        unitPrice: 25,
        salePrice: 35,
        stock: 50,
        supplierId: informatique.id,
      }),
      productRepo.create({
        name: 'Clavier mécanique',
        reference: 'CLA-001',
        unitPrice: 75,
        salePrice: 99,
        stock: 20,
        supplierId: bureautique.id,
      }),
    ]);
    logger.log('3 produits créés');

    logger.log('Seed terminé avec succès');
  } finally {
    await dataSource.destroy();
  }
}

seed().catch((error: unknown) => {
  logger.error(error instanceof Error ? error.stack ?? error.message : String(error));
  process.exit(1);
});
