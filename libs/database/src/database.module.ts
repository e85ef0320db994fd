import { Module, DynamicModule } from '@nestjs/common';
import { TypeOrmModule } from '@nestjs/typeorm';
import { ENTITIES } from './database.options';

/**
 * DatabaseModule: registers the entity repositories for injection.
 *
 * @example
 * ```ts
 * @Module({
 *   imports: [DatabaseModule.forFeature()],
 * })
 * export class SomeFeatureModule {}
 * ```
 */
@Module({})
export class DatabaseModule {
  static forFeature(): DynamicModule {
    return {
      module: DatabaseModule,
      imports: [TypeOrmModule.forFeature([...ENTITIES])],
      exports: [TypeOrmModule],
    };
  }
}
