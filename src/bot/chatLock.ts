/**
 * Per-chat sequential processing queue.
 *
 * Updates from one chat are handled in arrival order; different chats
 * drain independently, so a slow completion in one chat never holds
 * another chat's replies back.
 */
import { log } from "../utils/log.js";

type Task = () => Promise<void>;

interface Entry {
  task: Task;
  settle: () => void;
}

const queues = new Map<number, Entry[]>();
const active = new Set<number>();

/**
 * Queue a task for the chat. The returned promise settles once the task has
 * run; it never rejects, task errors are logged here.
 */
export function enqueue(chatId: number, task: Task): Promise<void> {
  return new Promise<void>((resolve) => {
    const queue = queues.get(chatId) ?? [];
    queue.push({ task, settle: resolve });
    queues.set(chatId, queue);
    if (!active.has(chatId)) void drain(chatId);
  });
}

async function drain(chatId: number): Promise<void> {
  active.add(chatId);
  for (let entry = queues.get(chatId)?.shift(); entry; entry = queues.get(chatId)?.shift()) {
    try {
      await entry.task();
    } catch (err) {
      log.error(`[chatLock] Task error in chat ${chatId}:`, err);
    } finally {
      entry.settle();
    }
  }
  queues.delete(chatId);
  active.delete(chatId);
}

export function isChatBusy(chatId: number): boolean {
  return active.has(chatId);
}
