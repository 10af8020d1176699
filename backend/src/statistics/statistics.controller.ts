import { Controller, Get, Query, UseGuards } from '@nestjs/common';
import { AuthGuard } from '@nestjs/passport';
import { StatisticsService } from './statistics.service';
import { parseBoolean } from '../config/database.config';

@Controller('statistiques')
@UseGuards(AuthGuard('jwt'))
export class StatisticsController {
  constructor(private statisticsService: StatisticsService) {}

  // ?exclure_annulees=true écarte les commandes annulées
  @Get('produits')
  async productStatistics(@Query('exclure_annulees') excludeCancelled?: string) {
    const stats = await this.statisticsService.productStatistics(parseBoolean(excludeCancelled, false));
    return stats.map((row) => ({
      produit_id: row.productId,
      nom_produit: row.productName,
      quantite_vendue: row.quantity,
      revenu_total: row.revenue,
    }));
  }
}
