import mongoose from "mongoose";
import { ConfigurationError } from "@/lib/errors";

type MongooseCache = {
  conn: typeof mongoose | null;
  promise: Promise<typeof mongoose> | null;
};

type GlobalWithMongoose = typeof globalThis & { _mongoose?: MongooseCache };

// cache no global: o dev server do Next recarrega módulos a cada edição
function cache(): MongooseCache {
  const g = global as GlobalWithMongoose;
  if (!g._mongoose) g._mongoose = { conn: null, promise: null };
  return g._mongoose;
}

export async function connectToDB(uri: string | undefined, dbName: string) {
  const c = cache();
  if (c.conn) return c.conn;
  if (!uri) throw new ConfigurationError("Missing MONGODB_URI");

  if (!c.promise) {
    c.promise = mongoose.connect(uri, { dbName });
  }
  try {
    c.conn = await c.promise;
  } catch (e) {
    // permite nova tentativa na próxima requisição
    c.promise = null;
    throw e;
  }
  return c.conn;
}

/** 1 = conectado (mongoose.ConnectionStates). */
export function dbReadyState() {
  return mongoose.connection.readyState;
}
