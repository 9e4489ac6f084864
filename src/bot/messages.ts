import { ANGER_MAX, SICK_THRESHOLD } from "../constants.js";
import { boycottMarker, sicknessMarker } from "../actions/markers.js";
import { formatLocal, parseTimestamp } from "../time.js";
import type { ActionNotice, ActionOutcome, PetDocument } from "../types.js";

export const START_TEXT = "Hi! Your pet is ready. Use /name, /feed, /walk, /status, /help";

export const HELP_TEXT =
  "Rules (short):\n" +
  "- Feed 3 times a day (ideally 09:00 / 14:00 / 19:00)\n" +
  "- Walk 2 times a day (ideally 09:00 and 19:00)\n" +
  "- Missed feeds and walks raise the anger and hunger scales\n" +
  "- At hunger>=100 or anger>=100 the pet goes on boycott and waits for /feed or /walk; " +
  "after that command it needs 2 hours to recover.";

export const NOT_FOUND_TEXT = "Pet not found. Send /start first.";
export const NAME_USAGE_TEXT = "Usage: /name <name>";
export const UNKNOWN_ERROR_TEXT = "Something went wrong. Please try again later.";

/** Renders a stored timestamp as local wall-clock time, or as-is when unparsable. */
export function formatUntil(value: string, timeZone: string): string {
  const date = parseTimestamp(value);
  return date ? `${formatLocal(date, timeZone)} (${timeZone})` : value;
}

export function renderNotice(notice: ActionNotice, timeZone: string): string {
  switch (notice.type) {
    case "overfed":
      return `Overfed: experience -${notice.penalty}.`;
    case "overfeed_sickness":
      return "Bad luck: the pet got sick from overeating.";
    case "walk_mishap":
      return `Something unpleasant happened on the walk: experience -${notice.loss}.`;
    case "boycott_started":
      return `Boycott accepted; the pet is resting until ${formatUntil(notice.until, timeZone)}.`;
    case "sickness_started":
      return `Recovery started; the pet gets better by ${formatUntil(notice.until, timeZone)}.`;
    case "sick":
      return `The pet is sick; recovery runs until ${formatUntil(notice.until, timeZone)}.`;
  }
}

export function renderAction(outcome: ActionOutcome, timeZone: string): string {
  if (!outcome.ok) {
    if (outcome.reason === "not_found") return NOT_FOUND_TEXT;
    return `${outcome.pet.pet_name} is on cooldown until ${formatUntil(outcome.until, timeZone)}. Try again later.`;
  }
  const head = outcome.action === "feed" ? "Fed." : "Walk done.";
  return [head, ...outcome.notices.map((n) => renderNotice(n, timeZone))].join(" ");
}

export function renderStatus(pet: PetDocument, timeZone: string): string {
  const lines = [
    `Status of ${pet.pet_name}:`,
    `Feeds today: morning ${pet.feed_morning}, afternoon ${pet.feed_afternoon}, evening ${pet.feed_evening}`,
    `Walks today: morning ${pet.walk_morning}, evening ${pet.walk_evening}`,
    `Total feeds: ${pet.total_feeds}  Total walks: ${pet.total_walks}`,
    `Anger: ${pet.anger} /${ANGER_MAX}`,
    `Hunger: ${pet.hunger_scale} /${SICK_THRESHOLD}`,
    `Experience: ${pet.experience}`,
    `Days lived: ${pet.days_lived}`,
  ];

  const boycott = boycottMarker(pet);
  if (boycott.kind === "pending") lines.push("The pet is on boycott and waits for /feed or /walk.");
  if (boycott.kind === "cooling") lines.push(`Boycott cooldown until: ${formatUntil(boycott.until, timeZone)}`);

  const sickness = sicknessMarker(pet);
  if (sickness.kind === "pending") lines.push("The pet is sick: send /feed or /walk, then wait 2 hours.");
  if (sickness.kind === "cooling") lines.push(`Recovery until: ${formatUntil(sickness.until, timeZone)}`);

  return lines.join("\n");
}
