import { MongoClient, Db, Collection } from "mongodb";
import type { PetDocument } from "./types.js";

let client: MongoClient | null = null;
let db: Db | null = null;

export async function getDb(uri = process.env.MONGO_URI || "mongodb://localhost:27017/petbot"): Promise<Db> {
  if (db) return db;
  const newClient = new MongoClient(uri);
  await newClient.connect();
  client = newClient;
  db = newClient.db();
  console.log(`[db] Connected to ${db.databaseName}`);
  return db;
}

export async function closeDb(): Promise<void> {
  if (!client) return;
  await client.close();
  client = null;
  db = null;
}

export async function pets(): Promise<Collection<PetDocument>> {
  return (await getDb()).collection<PetDocument>("pets");
}
