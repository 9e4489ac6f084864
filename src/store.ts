import type { Filter, FindOptions, UpdateFilter, UpdateOptions } from "mongodb";
import { pets } from "./db.js";
import type { PetDocument, PetPatch } from "./types.js";

/**
 * Durable pet records keyed by chat id. Each patch is applied to one record
 * atomically; callers serialize read-modify-write cycles per chat.
 */
export interface PetStore {
  get(chatId: number): Promise<PetDocument | null>;
  /** Inserts the record unless one exists for its chat id; returns the stored record. */
  create(pet: PetDocument): Promise<PetDocument>;
  /** Empty updates are a no-op. */
  patch(chatId: number, updates: PetPatch): Promise<void>;
  chatIds(): Promise<number[]>;
}

export function petDisplayName(baseName: string, seed: string | undefined): string {
  return `${baseName}(${seed || "no_nick"})`;
}

export function newPetDocument(fields: {
  chatId: number;
  ownerName: string;
  petName: string;
  today: string;
  createdAt: string;
}): PetDocument {
  return {
    _id: fields.chatId,
    owner_name: fields.ownerName,
    pet_name: fields.petName,
    feed_morning: 0,
    feed_afternoon: 0,
    feed_evening: 0,
    walk_morning: 0,
    walk_evening: 0,
    total_feeds: 0,
    total_walks: 0,
    anger: 0,
    hunger_scale: 0,
    sick_flag: false,
    sick_until: null,
    boycott_active: false,
    boycott_until: null,
    experience: 0,
    days_lived: 0,
    last_reset: fields.today,
    created_at: fields.createdAt,
  };
}

/** The part of the driver's `Collection<PetDocument>` that MongoPetStore calls. */
export interface PetCollection {
  findOne(filter: Filter<PetDocument>): Promise<PetDocument | null>;
  updateOne(filter: Filter<PetDocument>, update: UpdateFilter<PetDocument>, options?: UpdateOptions): Promise<unknown>;
  find(filter: Filter<PetDocument>, options: FindOptions): { toArray(): Promise<Pick<PetDocument, "_id">[]> };
}

export class MongoPetStore implements PetStore {
  private collection: () => Promise<PetCollection>;

  constructor(collection: () => Promise<PetCollection> = pets) {
    this.collection = collection;
  }

  async get(chatId: number): Promise<PetDocument | null> {
    const col = await this.collection();
    return col.findOne({ _id: chatId });
  }

  async create(pet: PetDocument): Promise<PetDocument> {
    const col = await this.collection();
    const { _id, ...fields } = pet;
    await col.updateOne({ _id }, { $setOnInsert: fields }, { upsert: true });

    const stored = await col.findOne({ _id });
    if (!stored) throw new Error(`Pet ${_id} missing after upsert`);
    return stored;
  }

  async patch(chatId: number, updates: PetPatch): Promise<void> {
    if (Object.keys(updates).length === 0) return;
    const col = await this.collection();
    await col.updateOne({ _id: chatId }, { $set: updates });
  }

  async chatIds(): Promise<number[]> {
    const col = await this.collection();
    const docs = await col.find({}, { projection: { _id: 1 } }).toArray();
    return docs.map((d) => d._id);
  }
}
