import { Controller, HttpCode, Param, ParseUUIDPipe, Post } from '@nestjs/common';
import { AccountTestReport, HealthCheckService, ProxyCheckReport } from './health-check.service';

@Controller()
export class InventoryController {
  constructor(private readonly healthCheckService: HealthCheckService) {}

  @Post('proxies/check')
  @HttpCode(200)
  async checkAllProxies(): Promise<ProxyCheckReport[]> {
    return this.healthCheckService.checkAllProxies();
  }

  @Post('proxies/:id/check')
  @HttpCode(200)
  async checkProxy(@Param('id', ParseUUIDPipe) id: string): Promise<ProxyCheckReport> {
    return this.healthCheckService.checkProxy(id);
  }

  @Post('accounts/:id/test')
  @HttpCode(200)
  async testAccount(@Param('id', ParseUUIDPipe) id: string): Promise<AccountTestReport> {
    return this.healthCheckService.testAccount(id);
  }
}
