import { databaseConfig } from './environment.js';

export interface DatabaseConfig {
  host: string;
  port: number;
  user: string;
  password: string;
  database: string;
  ssl: boolean;
}

export function getDatabaseConfig(): DatabaseConfig {
  return databaseConfig.get();
}
