import type { Transition, TransitionContext } from "./actions/context.js";
import { applyDailyReset } from "./actions/dailyReset.js";
import { applyFeed } from "./actions/feed.js";
import { applyWalk } from "./actions/walk.js";
import { KeyedMutex } from "./lock.js";
import type { RandomSource } from "./random.js";
import { mathRandom } from "./random.js";
import type { PetStore } from "./store.js";
import { newPetDocument, petDisplayName } from "./store.js";
import { localDate, toZonedIso } from "./time.js";
import type { ActionKind, ActionOutcome, PetDocument, ResetOutcome } from "./types.js";

export interface PetEngineOptions {
  store: PetStore;
  timeZone: string;
  petBaseName?: string;
  random?: RandomSource;
  clock?: () => Date;
}

/**
 * Entry point for every state change. Each call locks its chat, reads the
 * record, applies one transition and writes the result back as one patch.
 */
export class PetEngine {
  readonly timeZone: string;
  readonly petBaseName: string;
  private store: PetStore;
  private random: RandomSource;
  private clock: () => Date;
  private locks = new KeyedMutex<number>();

  constructor(options: PetEngineOptions) {
    this.store = options.store;
    this.timeZone = options.timeZone;
    this.petBaseName = options.petBaseName ?? "Vanya";
    this.random = options.random ?? mathRandom;
    this.clock = options.clock ?? (() => new Date());
  }

  async start(chatId: number, ownerName: string, displaySeed?: string): Promise<PetDocument> {
    return this.locks.run<PetDocument>(chatId, async () => {
      const now = this.clock();
      return this.store.create(
        newPetDocument({
          chatId,
          ownerName,
          petName: petDisplayName(this.petBaseName, displaySeed),
          today: localDate(now, this.timeZone),
          createdAt: toZonedIso(now, this.timeZone),
        }),
      );
    });
  }

  /** Current time on the engine's clock. */
  now(): Date {
    return this.clock();
  }

  async chatIds(): Promise<number[]> {
    return this.store.chatIds();
  }

  async status(chatId: number): Promise<PetDocument | null> {
    return this.store.get(chatId);
  }

  async rename(chatId: number, name: string): Promise<PetDocument | null> {
    return this.locks.run<PetDocument | null>(chatId, async () => {
      const pet = await this.store.get(chatId);
      if (!pet) return null;
      const pet_name = petDisplayName(this.petBaseName, name);
      await this.store.patch(chatId, { pet_name });
      return { ...pet, pet_name };
    });
  }

  async feed(chatId: number): Promise<ActionOutcome> {
    return this.act("feed", chatId, applyFeed);
  }

  async walk(chatId: number): Promise<ActionOutcome> {
    return this.act("walk", chatId, applyWalk);
  }

  /**
   * Applies the daily reset to one pet. With skipIfDone the reset is skipped
   * when it already ran for the current civil date.
   */
  async dailyReset(chatId: number, options: { skipIfDone?: boolean } = {}): Promise<ResetOutcome> {
    return this.locks.run<ResetOutcome>(chatId, async () => {
      const pet = await this.store.get(chatId);
      if (!pet) return { chat_id: chatId, status: "missing" };

      const today = localDate(this.clock(), this.timeZone);
      if (options.skipIfDone && pet.last_reset === today) {
        return { chat_id: chatId, status: "skipped", last_reset: today };
      }

      const patch = applyDailyReset(pet, { today, random: this.random });
      await this.store.patch(chatId, patch);
      return {
        chat_id: chatId,
        status: "applied",
        anger: patch.anger ?? pet.anger,
        hunger_scale: patch.hunger_scale ?? pet.hunger_scale,
      };
    });
  }

  private context(): TransitionContext {
    return { now: this.clock(), timeZone: this.timeZone, random: this.random };
  }

  private async act(
    action: ActionKind,
    chatId: number,
    transition: (pet: PetDocument, ctx: TransitionContext) => Transition,
  ): Promise<ActionOutcome> {
    return this.locks.run<ActionOutcome>(chatId, async () => {
      const pet = await this.store.get(chatId);
      if (!pet) return { ok: false, reason: "not_found" };

      const result = transition(pet, this.context());
      if (!result.ok) return { ok: false, reason: "cooldown", until: result.until, pet };

      await this.store.patch(chatId, result.patch);
      for (const notice of result.notices) {
        if (notice.type === "boycott_started" || notice.type === "sickness_started") {
          console.log(`[engine] chat ${chatId}: ${notice.type} until ${notice.until}`);
        }
      }
      return { ok: true, action, pet: { ...pet, ...result.patch }, notices: result.notices };
    });
  }
}
