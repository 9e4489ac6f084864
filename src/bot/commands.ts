import { z } from "zod";
import { PET_NAME_MAX_LENGTH } from "../constants.js";
import type { PetEngine } from "../engine.js";
import {
  HELP_TEXT,
  NAME_USAGE_TEXT,
  NOT_FOUND_TEXT,
  START_TEXT,
  renderAction,
  renderStatus,
} from "./messages.js";

export const COMMAND_NAMES = ["start", "help", "name", "status", "feed", "walk"] as const;
export type CommandName = (typeof COMMAND_NAMES)[number];

// Matches "/feed", "/feed@SomeBot" and "/name Rex the Second".
export const COMMAND_PATTERN = /^\/(start|help|name|status|feed|walk)(?:@\w+)?(?:\s+([\s\S]*))?$/;

export interface CommandEvent {
  chatId: number;
  command: CommandName;
  args: string;
  ownerName: string;
  username?: string;
}

const petNameSchema = z.string().trim().min(1).max(PET_NAME_MAX_LENGTH);

function isCommandName(value: string): value is CommandName {
  return COMMAND_NAMES.some((name) => name === value);
}

export function parseCommand(text: string): { command: CommandName; args: string } | null {
  const match = COMMAND_PATTERN.exec(text.trim());
  if (!match || !isCommandName(match[1])) return null;
  return { command: match[1], args: (match[2] ?? "").trim() };
}

export function ownerNameFor(user: { first_name?: string; last_name?: string; username?: string } | undefined): string {
  if (!user) return "Player";
  const fullName = [user.first_name, user.last_name].filter((part) => part && part.trim()).join(" ");
  return fullName || user.username || "Player";
}

/** Runs one command against the engine and returns the reply text. */
export async function handleCommand(engine: PetEngine, event: CommandEvent): Promise<string> {
  const { chatId } = event;

  switch (event.command) {
    case "start":
      await engine.start(chatId, event.ownerName, event.username);
      return START_TEXT;

    case "help":
      return HELP_TEXT;

    case "name": {
      if (!event.args.trim()) return NAME_USAGE_TEXT;
      const parsed = petNameSchema.safeParse(event.args);
      if (!parsed.success) return `Name is too long (max ${PET_NAME_MAX_LENGTH} characters).`;
      const pet = await engine.rename(chatId, parsed.data);
      if (!pet) return NOT_FOUND_TEXT;
      return `Pet name set: ${pet.pet_name}`;
    }

    case "status": {
      const pet = await engine.status(chatId);
      return pet ? renderStatus(pet, engine.timeZone) : NOT_FOUND_TEXT;
    }

    case "feed":
      return renderAction(await engine.feed(chatId), engine.timeZone);

    case "walk":
      return renderAction(await engine.walk(chatId), engine.timeZone);
  }
}
