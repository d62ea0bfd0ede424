import { Module } from '@nestjs/common';
import { EngineModule } from '../engine/engine.module';
import { HealthCheckService } from './health-check.service';
import { InventoryController } from './inventory.controller';

@Module({
  imports: [EngineModule],
  controllers: [InventoryController],
  providers: [HealthCheckService],
})
export class InventoryModule {}
