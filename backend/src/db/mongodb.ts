/**
 * MongoDB connection
 *
 * One pooled MongoClient per process. The driver's pool is safe to share
 * across concurrent requests.
 */

import { MongoClient, type Db } from 'mongodb';

export interface MongoSettings {
  uri: string;
  dbName: string;
  timeoutMs: number;
}

let client: MongoClient | null = null;
let db: Db | null = null;

export async function connectMongo(settings: MongoSettings): Promise<Db> {
  if (db) return db;

  client = new MongoClient(settings.uri, {
    serverSelectionTimeoutMS: settings.timeoutMs,
    appName: 'wildvision-observations',
  });
  await client.connect();
  db = client.db(settings.dbName);

  console.log(`[DB] Connected to MongoDB, database: ${settings.dbName}`);
  return db;
}

export async function disconnectMongo(): Promise<void> {
  if (!client) return;
  await client.close();
  client = null;
  db = null;
  console.log('[DB] Disconnected from MongoDB');
}
