import { Global, Module } from '@nestjs/common';
import { ConfigModule, ConfigService } from '@nestjs/config';
import { Clock, SystemClock } from './application/clock';
import { WorkflowSettings } from './application/workflow-settings';
import { WorkflowUnitOfWork } from './application/workflow-unit-of-work';
import {
  validateEnvironment,
  workflowSettingsFromConfig,
} from './infrastructure/config/environment';
import { DatabaseService } from './infrastructure/database/database.service';
import { KyselyWorkflowUnitOfWork } from './infrastructure/database/kysely-workflow-unit-of-work';

@Global()
@Module({
  imports: [
    ConfigModule.forRoot({
      isGlobal: true,
      validate: validateEnvironment,
    }),
  ],
  providers: [
    DatabaseService,
    {
      provide: WorkflowSettings,
      inject: [ConfigService],
      useFactory: workflowSettingsFromConfig,
    },
    {
      provide: Clock,
      useClass: SystemClock,
    },
    {
      provide: WorkflowUnitOfWork,
      useClass: KyselyWorkflowUnitOfWork,
    },
  ],
  exports: [DatabaseService, WorkflowSettings, Clock, WorkflowUnitOfWork],
})
export class PlatformModule {}
