import { DynamicModule, Module, Provider } from '@nestjs/common';
import { TypeOrmModule } from '@nestjs/typeorm';
import { ConfigModule } from '../config/config.module';
import { ConfigService, StorageDriver } from '../config/config.service';
import { Campaign } from '../campaign/entities/campaign.entity';
import { Job } from '../jobs/entities/job.entity';
import { Account } from '../inventory/entities/account.entity';
import { ProxyEndpoint } from '../inventory/entities/proxy.entity';
import { AccountRepository, CampaignRepository, JobRepository, ProxyRepository } from './repositories';
import {
  MemoryAccountRepository,
  MemoryCampaignRepository,
  MemoryJobRepository,
  MemoryProxyRepository,
} from './memory/memory.repositories';
import {
  TypeOrmAccountRepository,
  TypeOrmCampaignRepository,
  TypeOrmJobRepository,
  TypeOrmProxyRepository,
} from './typeorm/typeorm.repositories';

export const ENTITIES = [Campaign, Job, Account, ProxyEndpoint];

const REPOSITORY_TOKENS = [CampaignRepository, JobRepository, AccountRepository, ProxyRepository];

@Module({})
export class PersistenceModule {
  static forRoot(driver: StorageDriver): DynamicModule {
    if (driver === 'memory') {
      const providers: Provider[] = [
        MemoryJobRepository,
        MemoryCampaignRepository,
        MemoryAccountRepository,
        MemoryProxyRepository,
        { provide: JobRepository, useExisting: MemoryJobRepository },
        { provide: CampaignRepository, useExisting: MemoryCampaignRepository },
        { provide: AccountRepository, useExisting: MemoryAccountRepository },
        { provide: ProxyRepository, useExisting: MemoryProxyRepository },
      ];
      return {
        module: PersistenceModule,
        global: true,
        providers,
        exports: REPOSITORY_TOKENS,
      };
    }

    return {
      module: PersistenceModule,
      global: true,
      imports: [
        TypeOrmModule.forRootAsync({
          imports: [ConfigModule],
          useFactory: (configService: ConfigService) => ({
            type: 'postgres',
            host: configService.postgresHost,
            port: configService.postgresPort,
            username: configService.postgresUser,
            password: configService.postgresPassword,
            database: configService.postgresDatabase,
            entities: ENTITIES,
            synchronize: configService.nodeEnv !== 'production',
          }),
          inject: [ConfigService],
        }),
        TypeOrmModule.forFeature(ENTITIES),
      ],
      providers: [
        { provide: JobRepository, useClass: TypeOrmJobRepository },
        { provide: CampaignRepository, useClass: TypeOrmCampaignRepository },
        { provide: AccountRepository, useClass: TypeOrmAccountRepository },
        { provide: ProxyRepository, useClass: TypeOrmProxyRepository },
      ],
      exports: REPOSITORY_TOKENS,
    };
  }
}
