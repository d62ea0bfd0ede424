import { DynamicModule, Module } from "@nestjs/common";
import { CampaignModule } from "./campaign/campaign.module";
import { ConfigModule } from "./config/config.module";
import { StorageDriver } from "./config/config.service";
import { InventoryModule } from "./inventory/inventory.module";
import { JobsModule } from "./jobs/jobs.module";
import { PersistenceModule } from "./persistence/persistence.module";

@Module({})
export class AppModule {
  static forRoot(storageDriver: StorageDriver): DynamicModule {
    return {
      module: AppModule,
      imports: [
        ConfigModule,
        PersistenceModule.forRoot(storageDriver),
        CampaignModule,
        JobsModule,
        InventoryModule,
      ],
    };
  }
}
