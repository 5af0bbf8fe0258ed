/**
 * MongoDB connection (mongoose).
 */

import mongoose from 'mongoose';

export async function connectMongo(url: string, dbName: string): Promise<void> {
  console.log(`[Mongo] Connecting to ${dbName}...`);
  await mongoose.connect(url, { dbName });
  console.log('[Mongo] ✅ Connected');
}

export async function disconnectMongo(): Promise<void> {
  if (mongoose.connection.readyState !== 0) {
    await mongoose.disconnect();
    console.log('[Mongo] Disconnected');
  }
}
