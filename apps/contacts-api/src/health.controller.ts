import { Controller, Get } from '@nestjs/common';

@Controller('health')
export class HealthController {
  @Get()
  health() {
    return {
      status: 'healthy',
      service: 'contacts-api',
      timestamp: new Date().toISOString(),
    };
  }
}
