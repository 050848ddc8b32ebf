import { Controller, Get } from '@nestjs/common';
import { ApiInfoResponse, HealthResponse } from './common/interfaces/health.interface';

@Controller()
export class AppController {
  /**
   * Health check for load balancers and monitoring.
   *
   * GET /health
   */
  @Get('health')
  getHealth(): HealthResponse {
    return {
      status: 'ok',
      timestamp: new Date().toISOString(),
      uptime: process.uptime(),
      service: 'holdings-valuation-service',
    };
  }

  /**
   * API root - returns service info and available endpoints.
   *
   * GET /
   */
  @Get()
  getRoot(): ApiInfoResponse {
    return {
      message: 'Holdings Valuation & Price Alert API',
      version: '1.0.0',
      endpoints: {
        health: '/health',
        holdings: '/holdings',
        positions: '/holdings/:id/positions',
        history: '/holdings/:id/history',
        alerts: '/alerts',
        marketPrices: '/market-prices/:ticker',
      },
    };
  }
}
