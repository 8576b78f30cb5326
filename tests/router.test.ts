import { describe, test, beforeEach, afterEach } from "node:test";
import assert from "node:assert/strict";
import fs from "node:fs";
import os from "node:os";
import path from "node:path";
import { handleText, renderGoalList, type Reply, type ReplyOptions, type RouterDeps } from "../src/bot/router.js";
import { MAIN_MENU, MENU_LABELS, TEXTS, goalAddedText } from "../src/bot/menu.js";
import { GoalStore, type GoalRepository, type GoalSummary } from "../src/storage/store.js";
import { APOLOGY_MESSAGE, CompletionClient, type Completer } from "../src/llm/openaiClient.js";
import { setLogLevel } from "../src/utils/log.js";

setLogLevel("error");

interface Sent {
  text: string;
  options?: ReplyOptions;
}

class Chat {
  readonly sent: Sent[] = [];
  readonly reply: Reply = async (text, options) => {
    this.sent.push(options ? { text, options } : { text });
  };

  constructor(private readonly ownerId: number, private readonly deps: RouterDeps) {}

  async say(text: string): Promise<Sent[]> {
    const from = this.sent.length;
    await handleText(text, { ownerId: this.ownerId, reply: this.reply }, this.deps);
    return this.sent.slice(from);
  }
}

class FakeCompleter implements Completer {
  readonly prompts: string[] = [];

  async ask(prompt: string): Promise<string> {
    this.prompts.push(prompt);
    return `Answer to: ${prompt}`;
  }
}

/** Records calls and refuses mutations, to prove a handler never reached the store. */
class ReadOnlyGoals implements GoalRepository {
  readonly calls: string[] = [];

  createGoal(): number {
    this.calls.push("createGoal");
    throw new Error("unexpected createGoal");
  }

  listGoals(): GoalSummary[] {
    this.calls.push("listGoals");
    return [];
  }

  markDone(): number {
    this.calls.push("markDone");
    throw new Error("unexpected markDone");
  }

  deleteGoal(): number {
    this.calls.push("deleteGoal");
    throw new Error("unexpected deleteGoal");
  }
}

describe("command router", () => {
  let dir = "";
  let goals: GoalStore;
  let completer: FakeCompleter;
  let deps: RouterDeps;

  beforeEach(() => {
    dir = fs.mkdtempSync(path.join(os.tmpdir(), "goalpilot-router-"));
    goals = new GoalStore(path.join(dir, "goals.db"));
    goals.init();
    completer = new FakeCompleter();
    deps = { goals, completer };
  });

  afterEach(() => {
    fs.rmSync(dir, { recursive: true, force: true });
  });

  test("/start sends help with the menu keyboard", async () => {
    const chat = new Chat(1, deps);
    assert.deepEqual(await chat.say("/start"), [{ text: TEXTS.help, options: { keyboard: MAIN_MENU } }]);
  });

  test("/ask without a question sends usage and calls nothing", async () => {
    const chat = new Chat(1, deps);
    assert.deepEqual(await chat.say("/ask   "), [{ text: TEXTS.askUsage, options: { markdown: true } }]);
    assert.deepEqual(completer.prompts, []);
  });

  test("/ask sends a thinking notice, then the answer", async () => {
    const chat = new Chat(1, deps);
    assert.deepEqual(await chat.say("/ask  Plan my morning "), [
      { text: TEXTS.thinking },
      { text: "Answer to: Plan my morning" },
    ]);
    assert.deepEqual(completer.prompts, ["Plan my morning"]);
  });

  test("/addgoal without text sends usage", async () => {
    const chat = new Chat(1, deps);
    assert.deepEqual(await chat.say("/addgoal"), [{ text: TEXTS.addGoalUsage, options: { markdown: true } }]);
    assert.deepEqual(goals.listGoals(1), []);
  });

  test("/goals with no goals hints at /addgoal", async () => {
    const chat = new Chat(1, deps);
    assert.deepEqual(await chat.say("/goals"), [{ text: TEXTS.noGoals, options: { markdown: true } }]);
  });

  test("goal lifecycle: add, list, done, delete", async () => {
    const chat = new Chat(1, deps);

    assert.deepEqual(await chat.say("/addgoal Buy milk"), [{ text: goalAddedText(1) }]);
    assert.deepEqual(await chat.say("/goals"), [{ text: "⏳ *1*. Buy milk", options: { markdown: true } }]);

    assert.deepEqual(await chat.say("/done 1"), [{ text: TEXTS.doneOk }]);
    assert.deepEqual(await chat.say("/goals"), [{ text: "✅ *1*. Buy milk", options: { markdown: true } }]);

    assert.deepEqual(await chat.say("/del 1"), [{ text: TEXTS.deleted }]);
    assert.deepEqual(await chat.say("/goals"), [{ text: TEXTS.noGoals, options: { markdown: true } }]);
  });

  test("goal list is newest first", async () => {
    const chat = new Chat(1, deps);
    await chat.say("/addgoal one");
    await chat.say("/addgoal two");
    await chat.say("/done 1");
    assert.deepEqual(await chat.say("/goals"), [{ text: "⏳ *2*. two\n✅ *1*. one", options: { markdown: true } }]);
  });

  test("another owner's goal reads as not found", async () => {
    const alice = new Chat(1, deps);
    const bob = new Chat(2, deps);
    await alice.say("/addgoal Private plan");

    assert.deepEqual(await bob.say("/goals"), [{ text: TEXTS.noGoals, options: { markdown: true } }]);
    assert.deepEqual(await bob.say("/done 1"), [{ text: TEXTS.notFound }]);
    assert.deepEqual(await bob.say("/del 1"), [{ text: TEXTS.notFound }]);
    assert.deepEqual(goals.listGoals(1), [{ id: 1, text: "Private plan", isDone: false }]);
  });

  test("/done and /del with a missing id say not found", async () => {
    const chat = new Chat(1, deps);
    assert.deepEqual(await chat.say("/done 42"), [{ text: TEXTS.notFound }]);
    assert.deepEqual(await chat.say("/del 42"), [{ text: TEXTS.notFound }]);
  });

  test("non-numeric ids send usage without touching the store", async () => {
    const readOnly = new ReadOnlyGoals();
    const chat = new Chat(1, { goals: readOnly, completer });
    assert.deepEqual(await chat.say("/done abc"), [{ text: TEXTS.doneUsage, options: { markdown: true } }]);
    assert.deepEqual(await chat.say("/del -5"), [{ text: TEXTS.delUsage, options: { markdown: true } }]);
    assert.deepEqual(readOnly.calls, []);
  });

  test("ids too large to exist say not found without touching the store", async () => {
    const readOnly = new ReadOnlyGoals();
    const chat = new Chat(1, { goals: readOnly, completer });
    assert.deepEqual(await chat.say("/done 9007199254740993"), [{ text: TEXTS.notFound }]);
    assert.deepEqual(await chat.say("/del 99999999999999999999"), [{ text: TEXTS.notFound }]);
    assert.deepEqual(readOnly.calls, []);
  });

  test("commands for another bot get the menu, not a goal reply", async () => {
    const sent: Sent[] = [];
    const reply: Reply = async (text, options) => {
      sent.push(options ? { text, options } : { text });
    };
    const ctx = { ownerId: 1, reply, botUsername: "goalpilot_bot" };
    await handleText("/addgoal@goalpilot_bot Mine", ctx, deps);
    await handleText("/goals@other_bot", ctx, deps);
    assert.deepEqual(sent, [
      { text: goalAddedText(1) },
      { text: TEXTS.chooseFromMenu, options: { keyboard: MAIN_MENU } },
    ]);
  });

  test("menu buttons", async () => {
    const chat = new Chat(1, deps);
    assert.deepEqual(await chat.say(MENU_LABELS.askAi), [{ text: TEXTS.askButtonHint, options: { markdown: true } }]);
    assert.deepEqual(await chat.say(MENU_LABELS.myGoals), [{ text: TEXTS.noGoals, options: { markdown: true } }]);
    assert.deepEqual(await chat.say(MENU_LABELS.newChallenge), [{ text: TEXTS.challengePlaceholder }]);
    assert.deepEqual(await chat.say(MENU_LABELS.dailyPlan), [{ text: TEXTS.dailyPlanPlaceholder }]);
  });

  test("unrecognised text re-sends the menu", async () => {
    const chat = new Chat(1, deps);
    const expected = [{ text: TEXTS.chooseFromMenu, options: { keyboard: MAIN_MENU } }];
    assert.deepEqual(await chat.say("what can you do?"), expected);
    assert.deepEqual(await chat.say("/settings"), expected);
  });

  test("a storage failure becomes a generic reply", async () => {
    const failing: GoalRepository = {
      createGoal: () => {
        throw new Error("disk I/O error");
      },
      listGoals: () => {
        throw new Error("disk I/O error");
      },
      markDone: () => 0,
      deleteGoal: () => 0,
    };
    const chat = new Chat(1, { goals: failing, completer });
    assert.deepEqual(await chat.say("/addgoal Fails"), [{ text: TEXTS.internalError }]);
    assert.deepEqual(await chat.say("/goals"), [{ text: TEXTS.internalError }]);
  });

  test("a failing completion still yields exactly one answer", async () => {
    const client = new CompletionClient({
      apiKey: "test-secret",
      model: "test-model",
      baseUrl: "https://llm.invalid/v1",
      maxTokens: 600,
      temperature: 0.3,
      timeoutMs: 1000,
      fetchFn: async () => {
        throw new TypeError("fetch failed");
      },
    });
    const chat = new Chat(1, { goals, completer: client });
    assert.deepEqual(await chat.say("/ask Anything"), [{ text: TEXTS.thinking }, { text: APOLOGY_MESSAGE }]);
  });
});

describe("renderGoalList", () => {
  test("escapes Markdown in goal text", () => {
    assert.equal(
      renderGoalList([{ id: 3, text: "fix_bug *now* [x]", isDone: false }]),
      "⏳ *3*. fix\\_bug \\*now\\* \\[x]"
    );
  });
});
