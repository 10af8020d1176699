import { Injectable, Logger } from '@nestjs/common';
import { InjectRepository } from '@nestjs/typeorm';
import { FindOptionsWhere, Repository } from 'typeorm';
import { AuditDetails, AuditLog } from '../entities/audit-log.entity';

export interface AuditQuery {
  action?: string;
  entityType?: string;
  limit?: number;
  offset?: number;
}

@Injectable()
export class AuditService {
  private readonly logger = new Logger(AuditService.name);

  constructor(
    @InjectRepository(AuditLog)
    private auditLogRepository: Repository<AuditLog>,
  ) {}

  // Appelé après la validation de l'opération métier : un échec d'écriture
  // du journal est tracé mais ne remonte pas à l'appelant.
  async log(
    userId: string | null,
    action: string,
    entityType: string,
    entityId: string | number | null,
    details: AuditDetails | null = null,
  ): Promise<void> {
    try {
      const auditLog = this.auditLogRepository.create({
        userId,
        action,
        entityType,
        entityId: entityId === null ? null : String(entityId),
        details,
      });
      await this.auditLogRepository.save(auditLog);
    } catch (error) {
      const reason = error instanceof Error ? error.message : String(error);
      this.logger.error(`Failed to record ${action} on ${entityType} ${entityId ?? ''}: ${reason}`);
    }
  }

  // Plus récentes d'abord ; `total` compte toutes les entrées filtrées
  async findAll(query: AuditQuery = {}): Promise<{ data: AuditLog[]; total: number }> {
    const where: FindOptionsWhere<AuditLog> = {};
    if (query.action) {
      where.action = query.action;
    }
    if (query.entityType) {
      where.entityType = query.entityType;
    }

    const [data, total] = await this.auditLogRepository.findAndCount({
      where,
      relations: { user: true },
      order: { createdAt: 'DESC' },
      skip: query.offset,
      take: query.limit,
    });

    return { data, total };
  }

  async getActions(): Promise<string[]> {
    const rows = await this.auditLogRepository
      .createQueryBuilder('audit')
      .select('DISTINCT audit.action', 'action')
      .getRawMany<{ action: string }>();

    return rows.map((row) => row.action).sort();
  }
}
