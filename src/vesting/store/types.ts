export interface StoreConfig {
  type: 'memory' | 'sqlite';
  sqlite?: SqliteStoreConfig;
}

export interface SqliteStoreConfig {
  dbPath: string;
  walMode?: boolean;
  cacheSize?: number;
}
