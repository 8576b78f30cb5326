/**
 * Command router — maps a decoded Command to its handler.
 * Stateless across turns: everything a handler needs arrives through
 * TurnContext and RouterDeps.
 */
import { parseCommand, type Command, type GoalIdArg } from "./commands.js";
import { MAIN_MENU, TEXTS, escapeMarkdown, goalAddedText } from "./menu.js";
import type { GoalRepository, GoalSummary } from "../storage/store.js";
import type { Completer } from "../llm/openaiClient.js";
import { log } from "../utils/log.js";

export interface ReplyOptions {
  markdown?: boolean;
  keyboard?: readonly (readonly string[])[];
}

export type Reply = (text: string, options?: ReplyOptions) => Promise<void>;

export interface TurnContext {
  ownerId: number;
  reply: Reply;
  /** This bot's username; commands addressed to another bot are not answered as commands. */
  botUsername?: string;
}

export interface RouterDeps {
  goals: GoalRepository;
  completer: Completer;
}

const MARKDOWN: ReplyOptions = { markdown: true };

export function renderGoalList(goals: GoalSummary[]): string {
  return goals
    .map((g) => `${g.isDone ? "✅" : "⏳"} *${g.id}*. ${escapeMarkdown(g.text)}`)
    .join("\n");
}

async function handleAsk(question: string, ctx: TurnContext, deps: RouterDeps): Promise<void> {
  if (!question) {
    await ctx.reply(TEXTS.askUsage, MARKDOWN);
    return;
  }
  await ctx.reply(TEXTS.thinking);
  const answer = await deps.completer.ask(question);
  await ctx.reply(answer);
}

async function handleAddGoal(text: string, ctx: TurnContext, deps: RouterDeps): Promise<void> {
  if (!text) {
    await ctx.reply(TEXTS.addGoalUsage, MARKDOWN);
    return;
  }
  const goalId = deps.goals.createGoal(ctx.ownerId, text);
  log.info(`[router] Owner ${ctx.ownerId} added goal #${goalId}`);
  await ctx.reply(goalAddedText(goalId));
}

async function handleListGoals(ctx: TurnContext, deps: RouterDeps): Promise<void> {
  const goals = deps.goals.listGoals(ctx.ownerId);
  if (goals.length === 0) {
    await ctx.reply(TEXTS.noGoals, MARKDOWN);
    return;
  }
  await ctx.reply(renderGoalList(goals), MARKDOWN);
}

async function handleMarkDone(goalId: GoalIdArg, ctx: TurnContext, deps: RouterDeps): Promise<void> {
  if (goalId.kind === "invalid") {
    await ctx.reply(TEXTS.doneUsage, MARKDOWN);
    return;
  }
  if (goalId.kind === "outOfRange") {
    await ctx.reply(TEXTS.notFound);
    return;
  }
  const changed = deps.goals.markDone(ctx.ownerId, goalId.id);
  await ctx.reply(changed > 0 ? TEXTS.doneOk : TEXTS.notFound);
}

async function handleDeleteGoal(goalId: GoalIdArg, ctx: TurnContext, deps: RouterDeps): Promise<void> {
  if (goalId.kind === "invalid") {
    await ctx.reply(TEXTS.delUsage, MARKDOWN);
    return;
  }
  if (goalId.kind === "outOfRange") {
    await ctx.reply(TEXTS.notFound);
    return;
  }
  const deleted = deps.goals.deleteGoal(ctx.ownerId, goalId.id);
  await ctx.reply(deleted > 0 ? TEXTS.deleted : TEXTS.notFound);
}

export async function dispatch(command: Command, ctx: TurnContext, deps: RouterDeps): Promise<void> {
  switch (command.kind) {
    case "start":
      return ctx.reply(TEXTS.help, { keyboard: MAIN_MENU });
    case "ask":
      return handleAsk(command.question, ctx, deps);
    case "addGoal":
      return handleAddGoal(command.text, ctx, deps);
    case "listGoals":
      return handleListGoals(ctx, deps);
    case "markDone":
      return handleMarkDone(command.goalId, ctx, deps);
    case "deleteGoal":
      return handleDeleteGoal(command.goalId, ctx, deps);
    case "askHint":
      return ctx.reply(TEXTS.askButtonHint, MARKDOWN);
    case "challenge":
      return ctx.reply(TEXTS.challengePlaceholder);
    case "dailyPlan":
      return ctx.reply(TEXTS.dailyPlanPlaceholder);
    case "unknown":
      return ctx.reply(TEXTS.chooseFromMenu, { keyboard: MAIN_MENU });
    default: {
      const unreachable: never = command;
      throw new Error(`Unhandled command: ${JSON.stringify(unreachable)}`);
    }
  }
}

/**
 * One full chat turn: decode the text, dispatch it, and turn an unexpected
 * failure (storage I/O) into a logged error plus a generic reply.
 */
export async function handleText(text: string, ctx: TurnContext, deps: RouterDeps): Promise<void> {
  const command = parseCommand(text, ctx.botUsername);
  log.debug(`[router] ${command.kind} from owner ${ctx.ownerId}`);
  try {
    await dispatch(command, ctx, deps);
  } catch (err) {
    log.error(`[router] Failed to handle ${command.kind} for owner ${ctx.ownerId}:`, err);
    await ctx.reply(TEXTS.internalError);
  }
}
