import { Module, DynamicModule } from '@nestjs/common';
import { TypeOrmModule } from '@nestjs/typeorm';
import { Document } from './entities/document.entity';
import { Job } from './entities/job.entity';
import { Extraction } from './entities/extraction.entity';
import { JOB_STORE } from './job-store/job-store.interface';
import { TypeOrmJobStore } from './job-store/typeorm-job-store';

/** All entity classes registered in this database library */
const ENTITIES = [Document, Job, Extraction] as const;

/**
 * DatabaseModule — registers the entity repositories and the JobStore.
 *
 * The root connection (TypeOrmModule.forRootAsync) is owned by the app;
 * this module only contributes feature-level providers.
 *
 * @example
 * ```ts
 * @Module({
 *   imports: [DatabaseModule.forFeature()],
 * })
 * export class JobsModule {}
 * ```
 */
@Module({})
export class DatabaseModule {
  static forFeature(): DynamicModule {
    return {
      module: DatabaseModule,
      imports: [TypeOrmModule.forFeature([...ENTITIES])],
      providers: [{ provide: JOB_STORE, useClass: TypeOrmJobStore }],
      exports: [TypeOrmModule, JOB_STORE],
    };
  }

  /**
   * Returns the array of all entity classes.
   * Useful for passing to TypeOrmModule.forRoot({ entities }).
   */
  static get entities(): ReadonlyArray<Function> {
    return ENTITIES;
  }
}
