import { Injectable, NotFoundException } from '@nestjs/common';
import { InjectRepository } from '@nestjs/typeorm';
import { Repository } from 'typeorm';
import { Charge } from '../entities/charge.entity';
import { AuditService } from '../audit/audit.service';
import { CreateChargeDto, UpdateChargeDto } from './dto/charge.dto';

// PostgreSQL renvoie les colonnes date en Date (minuit local), SQLite en texte
export function toDateOnly(value: string | Date): string {
  if (typeof value === 'string' && /^\d{4}-\d{2}-\d{2}$/.test(value)) {
    return value;
  }
  const date = new Date(value);
  const month = String(date.getMonth() + 1).padStart(2, '0');
  const day = String(date.getDate()).padStart(2, '0');
  return `${date.getFullYear()}-${month}-${day}`;
}

@Injectable()
export class ChargesService {
  constructor(
    @InjectRepository(Charge)
    private chargeRepository: Repository<Charge>,
    private auditService: AuditService,
  ) {}

  // Plus récentes d'abord
  async findAll(limit?: number): Promise<Charge[]> {
    return this.chargeRepository.find({
      order: { chargeDate: 'DESC', id: 'DESC' },
      take: limit,
    });
  }

  async findOne(id: number): Promise<Charge> {
    const charge = await this.chargeRepository.findOne({ where: { id } });

    if (!charge) {
      throw new NotFoundException(`Charge ${id} non trouvée`);
    }

    return charge;
  }

  async create(dto: CreateChargeDto, currentUserId: string): Promise<Charge> {
    const charge = this.chargeRepository.create({
      nature: dto.nature,
      amount: dto.montant,
      chargeDate: toDateOnly(dto.date ?? new Date()),
    });
    const savedCharge = await this.chargeRepository.save(charge);

    await this.auditService.log(currentUserId, 'CREATE_CHARGE', 'Charge', savedCharge.id, {
      nature: savedCharge.nature,
      amount: savedCharge.amount,
    });

    return savedCharge;
  }

  async update(id: number, dto: UpdateChargeDto, currentUserId: string): Promise<Charge> {
    const charge = await this.findOne(id);

    charge.nature = dto.nature ?? charge.nature;
    charge.amount = dto.montant ?? charge.amount;
    charge.chargeDate = dto.date ? toDateOnly(dto.date) : charge.chargeDate;
    const savedCharge = await this.chargeRepository.save(charge);

    await this.auditService.log(currentUserId, 'UPDATE_CHARGE', 'Charge', savedCharge.id, { ...dto });

    return savedCharge;
  }

  async remove(id: number, currentUserId: string): Promise<{ message: string }> {
    const charge = await this.findOne(id);

    await this.chargeRepository.remove(charge);
    await this.auditService.log(currentUserId, 'DELETE_CHARGE', 'Charge', id, { nature: charge.nature });

    return { message: 'Charge supprimée avec succès' };
  }
}
