import { DynamicModule, Provider, Type } from '@nestjs/common';
import { ConfigModule } from '@nestjs/config';
import { Test, TestingModule } from '@nestjs/testing';
import { getDataSourceToken, TypeOrmModule } from '@nestjs/typeorm';
import { DataSource } from 'typeorm';
import {
  appConfig,
  databaseConfig,
  paymentsConfig,
  stripeConfig,
} from '../../src/config/configuration';
import { TEST_ENTITIES } from './entities';

export interface TestingContext {
  module: TestingModule;
  dataSource: DataSource;
  close(): Promise<void>;
}

export interface TestingOptions {
  imports?: Array<Type<unknown> | DynamicModule>;
  providers?: Provider[];
  overrides?: Array<{
    token: string | symbol | Type<unknown>;
    useValue: unknown;
  }>;
}

/**
 * Compiles a Nest testing module backed by a fresh in-memory SQLite
 * database with every entity synchronised.
 */
export async function createTestingContext(
  options: TestingOptions = {},
): Promise<TestingContext> {
  let builder = Test.createTestingModule({
    imports: [
      ConfigModule.forRoot({
        isGlobal: true,
        ignoreEnvFile: true,
        load: [appConfig, databaseConfig, paymentsConfig, stripeConfig],
      }),
      TypeOrmModule.forRoot({
        type: 'better-sqlite3',
        database: ':memory:',
        entities: TEST_ENTITIES,
        synchronize: true,
        dropSchema: true,
        logging: false,
      }),
      ...(options.imports ?? []),
    ],
    providers: options.providers ?? [],
  });

  for (const override of options.overrides ?? []) {
    builder = builder
      .overrideProvider(override.token)
      .useValue(override.useValue);
  }

  const module = await builder.compile();
  const dataSource = module.get<DataSource>(getDataSourceToken());

  return {
    module,
    dataSource,
    close: () => module.close(),
  };
}
