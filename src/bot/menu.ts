/**
 * Reply keyboard labels and the fixed texts the bot sends.
 */

export const MENU_LABELS = {
  askAi: "🧠 Ask AI",
  myGoals: "🎯 My goals",
  newChallenge: "🚀 New challenge",
  dailyPlan: "📅 Plan for today",
} as const;

export const MAIN_MENU: readonly (readonly string[])[] = [
  [MENU_LABELS.askAi, MENU_LABELS.myGoals],
  [MENU_LABELS.newChallenge, MENU_LABELS.dailyPlan],
];

export const TEXTS = {
  help:
    "👋 Hi, I'm your planning bot with AI!\n" +
    "Commands:\n" +
    "• /ask your question — ask the AI\n" +
    "• /addgoal Goal text — add a goal\n" +
    "• /goals — list your goals\n" +
    "• /done ID — mark a goal as done\n" +
    "• /del ID — delete a goal\n",
  askUsage: "Write it like this: `/ask Help me plan my day`",
  askButtonHint: "Send the command in this format: `/ask Your question`",
  thinking: "🧠 Thinking about an answer…",
  addGoalUsage: "Type it like this: `/addgoal Run a half marathon`",
  noGoals: "No goals yet. Add one with `/addgoal ...`",
  doneUsage: "Type it like this: `/done 12` (where 12 is the goal ID)",
  delUsage: "Type it like this: `/del 12` (where 12 is the goal ID)",
  doneOk: "✅ Done!",
  deleted: "🗑 Deleted.",
  notFound: "❗️ Couldn't find that goal.",
  challengePlaceholder: "(The challenge builder is coming later)",
  dailyPlanPlaceholder: "(The daily plan is coming later)",
  chooseFromMenu: "Choose an action from the menu 👇",
  internalError: "Sorry, something went wrong. Please try again.",
} as const;

export function goalAddedText(goalId: number): string {
  return `✅ Goal added (ID: ${goalId})`;
}

/** Escape characters that legacy Telegram Markdown treats as entity markers. */
export function escapeMarkdown(text: string): string {
  return text.replace(/([_*`[])/g, "\\$1");
}
