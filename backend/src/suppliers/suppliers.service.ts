import { ConflictException, Injectable, NotFoundException } from '@nestjs/common';
import { InjectRepository } from '@nestjs/typeorm';
import { EntityManager, Repository } from 'typeorm';
import { Supplier } from '../entities/supplier.entity';
import { Order } from '../entities/order.entity';
import { AuditService } from '../audit/audit.service';
import { CreateSupplierDto, UpdateSupplierDto } from './dto/supplier.dto';

@Injectable()
export class SuppliersService {
  constructor(
    @InjectRepository(Supplier)
    private supplierRepository: Repository<Supplier>,
    @InjectRepository(Order)
    private orderRepository: Repository<Order>,
    private auditService: AuditService,
  ) {}

  async findAll(): Promise<Supplier[]> {
    return this.supplierRepository.find({ order: { name: 'ASC' } });
  }

  async findOne(id: number, manager?: EntityManager): Promise<Supplier> {
    const repository = manager ? manager.getRepository(Supplier) : this.supplierRepository;
    const supplier = await repository.findOne({ where: { id } });

    if (!supplier) {
      throw new NotFoundException(`Fournisseur ${id} non trouvé`);
    }

    return supplier;
  }

  async create(dto: CreateSupplierDto, currentUserId: string): Promise<Supplier> {
    const supplier = this.supplierRepository.create({
      name: dto.nom,
      contact: dto.contact ?? null,
    });
    const savedSupplier = await this.supplierRepository.save(supplier);

    await this.auditService.log(currentUserId, 'CREATE_SUPPLIER', 'Supplier', savedSupplier.id, {
      name: savedSupplier.name,
    });

    return savedSupplier;
  }

  async update(id: number, dto: UpdateSupplierDto, currentUserId: string): Promise<Supplier> {
    const supplier = await this.findOne(id);

    supplier.name = dto.nom ?? supplier.name;
    supplier.contact = dto.contact ?? supplier.contact;
    const savedSupplier = await this.supplierRepository.save(supplier);

    await this.auditService.log(currentUserId, 'UPDATE_SUPPLIER', 'Supplier', savedSupplier.id, { ...dto });

    return savedSupplier;
  }

  async remove(id: number, currentUserId: string): Promise<{ message: string }> {
    const supplier = await this.findOne(id);

    // Les commandes gardent leur fournisseur : suppression refusée
    const orderCount = await this.orderRepository.count({ where: { supplierId: id } });
    if (orderCount > 0) {
      throw new ConflictException(
        `Le fournisseur ${supplier.name} est référencé par ${orderCount} commande(s) et ne peut pas être supprimé`,
      );
    }

    await this.supplierRepository.remove(supplier);
    await this.auditService.log(currentUserId, 'DELETE_SUPPLIER', 'Supplier', id, { name: supplier.name });

    return { message: `Fournisseur ${supplier.name} supprimé avec succès` };
  }
}
