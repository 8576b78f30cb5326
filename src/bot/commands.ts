/**
 * Decodes raw chat text into a Command, once, before dispatch.
 */
import { MENU_LABELS } from "./menu.js";

export type Command =
  | { kind: "start" }
  | { kind: "ask"; question: string }
  | { kind: "addGoal"; text: string }
  | { kind: "listGoals" }
  | { kind: "markDone"; goalId: GoalIdArg }
  | { kind: "deleteGoal"; goalId: GoalIdArg }
  | { kind: "askHint" }
  | { kind: "challenge" }
  | { kind: "dailyPlan" }
  | { kind: "unknown" };

/**
 * A /done or /del argument. Only digits are accepted; a digit string too
 * large to be any stored id is still well-formed and reads as not found.
 */
export type GoalIdArg =
  | { kind: "id"; id: number }
  | { kind: "outOfRange" }
  | { kind: "invalid" };

export function parseGoalId(arg: string): GoalIdArg {
  const trimmed = arg.trim();
  if (!/^\d+$/.test(trimmed)) return { kind: "invalid" };
  const id = Number(trimmed);
  return Number.isSafeInteger(id) ? { kind: "id", id } : { kind: "outOfRange" };
}

/** Split "/name@bot  args" into its name, addressee and trimmed argument. */
function splitCommand(text: string): { name: string; addressee: string | null; arg: string } {
  const match = /^\/(\S+)(?:\s+([\s\S]*))?$/.exec(text);
  if (!match) return { name: "", addressee: null, arg: "" };
  const [name = "", addressee = null] = match[1].split("@");
  return { name, addressee, arg: (match[2] ?? "").trim() };
}

/**
 * `botUsername` is this bot's own username. A command addressed to another
 * bot (`/goals@other_bot`) is not ours and decodes as unknown.
 */
export function parseCommand(raw: string, botUsername?: string): Command {
  const text = raw.trim();

  if (text.startsWith("/")) {
    const { name, addressee, arg } = splitCommand(text);
    if (addressee !== null && botUsername !== undefined && addressee.toLowerCase() !== botUsername.toLowerCase()) {
      return { kind: "unknown" };
    }
    switch (name) {
      case "start":
        return { kind: "start" };
      case "ask":
        return { kind: "ask", question: arg };
      case "addgoal":
        return { kind: "addGoal", text: arg };
      case "goals":
        return { kind: "listGoals" };
      case "done":
        return { kind: "markDone", goalId: parseGoalId(arg) };
      case "del":
        return { kind: "deleteGoal", goalId: parseGoalId(arg) };
      default:
        return { kind: "unknown" };
    }
  }

  switch (text) {
    case MENU_LABELS.askAi:
      return { kind: "askHint" };
    case MENU_LABELS.myGoals:
      return { kind: "listGoals" };
    case MENU_LABELS.newChallenge:
      return { kind: "challenge" };
    case MENU_LABELS.dailyPlan:
      return { kind: "dailyPlan" };
    default:
      return { kind: "unknown" };
  }
}
