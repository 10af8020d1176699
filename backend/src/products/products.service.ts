import { BadRequestException, ConflictException, Injectable, NotFoundException } from '@nestjs/common';
import { InjectRepository } from '@nestjs/typeorm';
import { EntityManager, In, MoreThanOrEqual, Repository } from 'typeorm';
import { Product } from '../entities/product.entity';
import { AuditService } from '../audit/audit.service';
import { SuppliersService } from '../suppliers/suppliers.service';
import { InsufficientStockException } from '../common/exceptions/insufficient-stock.exception';
import { CreateProductDto, UpdateProductDto } from './dto/product.dto';

function assertPositiveQuantity(quantity: number) {
  if (!Number.isInteger(quantity) || quantity < 1) {
    throw new BadRequestException('La quantité doit être un entier positif');
  }
}

@Injectable()
export class ProductsService {
  constructor(
    @InjectRepository(Product)
    private productRepository: Repository<Product>,
    private suppliersService: SuppliersService,
    private auditService: AuditService,
  ) {}

  private repository(manager?: EntityManager): Repository<Product> {
    return manager ? manager.getRepository(Product) : this.productRepository;
  }

  async findAll(): Promise<Product[]> {
    return this.productRepository.find({ order: { id: 'ASC' } });
  }

  async findOne(id: number, manager?: EntityManager): Promise<Product> {
    const product = await this.repository(manager).findOne({ where: { id } });

    if (!product) {
      throw new NotFoundException(`Produit ${id} non trouvé`);
    }

    return product;
  }

  // Ids among `ids` that still exist
  async findExistingIds(ids: number[], manager?: EntityManager): Promise<Set<number>> {
    if (ids.length === 0) {
      return new Set();
    }
    const products = await this.repository(manager).find({
      where: { id: In(ids) },
      select: { id: true },
    });
    return new Set(products.map((p) => p.id));
  }

  async create(dto: CreateProductDto, currentUserId: string): Promise<Product> {
    await this.assertReferenceFree(dto.reference);
    if (dto.fournisseur_id !== undefined) {
      await this.suppliersService.findOne(dto.fournisseur_id);
    }

    const product = this.productRepository.create({
      name: dto.nom,
      reference: dto.reference,
      unitPrice: dto.prix_unitaire,
      stock: dto.stock_actuel,
      description: dto.description ?? null,
      salePrice: dto.prix_vente ?? null,
      supplierId: dto.fournisseur_id ?? null,
    });
    const savedProduct = await this.productRepository.save(product);

    await this.auditService.log(currentUserId, 'CREATE_PRODUCT', 'Product', savedProduct.id, {
      reference: savedProduct.reference,
      stock: savedProduct.stock,
    });

    return savedProduct;
  }

  async update(id: number, dto: UpdateProductDto, currentUserId: string): Promise<Product> {
    const product = await this.findOne(id);

    if (dto.reference !== undefined && dto.reference !== product.reference) {
      await this.assertReferenceFree(dto.reference);
    }
    if (dto.fournisseur_id !== undefined && dto.fournisseur_id !== null) {
      await this.suppliersService.findOne(dto.fournisseur_id);
    }

    Object.assign(product, {
      name: dto.nom ?? product.name,
      reference: dto.reference ?? product.reference,
      unitPrice: dto.prix_unitaire ?? product.unitPrice,
      stock: dto.stock_actuel ?? product.stock,
      description: dto.description ?? product.description,
      salePrice: dto.prix_vente ?? product.salePrice,
      supplierId: dto.fournisseur_id === undefined ? product.supplierId : dto.fournisseur_id,
    });
    const savedProduct = await this.productRepository.save(product);

    await this.auditService.log(currentUserId, 'UPDATE_PRODUCT', 'Product', savedProduct.id, { ...dto });

    return savedProduct;
  }

  // Les lignes de commande gardent leur instantané (nom, prix) ; leur produit_id passe à null
  async remove(id: number, currentUserId: string): Promise<{ message: string }> {
    const product = await this.findOne(id);

    await this.productRepository.remove(product);
    await this.auditService.log(currentUserId, 'DELETE_PRODUCT', 'Product', id, {
      reference: product.reference,
    });

    return { message: `Produit ${product.name} supprimé avec succès` };
  }

  /**
   * Takes `quantity` units out of the persisted stock, or throws
   * InsufficientStockException without touching anything. Check and
   * decrement are one conditional UPDATE, so stock never goes negative.
   */
  async reserveStock(productId: number, quantity: number, manager?: EntityManager): Promise<Product> {
    assertPositiveQuantity(quantity);
    const repository = this.repository(manager);
    const product = await this.findOne(productId, manager);

    const result = await repository.decrement(
      { id: productId, stock: MoreThanOrEqual(quantity) },
      'stock',
      quantity,
    );

    if (!result.affected) {
      const current = await this.findOne(productId, manager);
      throw new InsufficientStockException({
        productId,
        productName: current.name,
        requested: quantity,
        available: current.stock,
      });
    }

    product.stock -= quantity;
    return product;
  }

  // false when the product no longer exists
  async incrementStock(productId: number, quantity: number, manager?: EntityManager): Promise<boolean> {
    assertPositiveQuantity(quantity);
    const result = await this.repository(manager).increment({ id: productId }, 'stock', quantity);
    return !!result.affected;
  }

  // false when the product no longer exists; throws when stock would go negative
  async decrementStock(productId: number, quantity: number, manager?: EntityManager): Promise<boolean> {
    assertPositiveQuantity(quantity);
    const repository = this.repository(manager);
    const product = await repository.findOne({ where: { id: productId } });
    if (!product) {
      return false;
    }

    await this.reserveStock(productId, quantity, manager);
    return true;
  }

  private async assertReferenceFree(reference: string) {
    const existing = await this.productRepository.findOne({ where: { reference } });
    if (existing) {
      throw new ConflictException(`Un produit avec la référence ${reference} existe déjà`);
    }
  }
}
