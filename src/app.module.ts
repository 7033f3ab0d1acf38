import { Module } from '@nestjs/common';
import { APP_FILTER, APP_GUARD } from '@nestjs/core';
import { ConfigModule } from '@nestjs/config';
import { AppController } from './app.controller.js';
import { BasicAuthGuard } from './auth/basic-auth.guard.js';
import { PipelineExceptionFilter } from './common/pipeline-exception.filter.js';
import { AdminConfigModule } from './config/admin-config.module.js';
import { FirestoreModule } from './firestore/firestore.module.js';
import { GoogleModule } from './google/google.module.js';
import { JobsModule } from './jobs/jobs.module.js';
import { PlansModule } from './plans/plans.module.js';
import { StorageModule } from './storage/storage.module.js';

@Module({
  imports: [
    ConfigModule.forRoot({ isGlobal: true }), // reads .env
    FirestoreModule,
    StorageModule,
    AdminConfigModule,
    GoogleModule,
    PlansModule,
    JobsModule,
  ],
  controllers: [AppController],
  providers: [
    { provide: APP_GUARD, useClass: BasicAuthGuard },
    { provide: APP_FILTER, useClass: PipelineExceptionFilter },
  ],
})
export class AppModule {}
