import { Controller, Get } from '@nestjs/common';

@Controller()
export class AppController {
  @Get()
  health() {
    return { message: 'Bienvenue sur l\'API de Gestion des Achats. Santé du service : OK.' };
  }
}
