import type { ChatMessage } from "@askshell/core";
import { MAX_CHAT_WORDS, trimConversation } from "@askshell/history";
import { lineReader } from "../prompts.js";
import type { Session } from "../session.js";

const EXIT_WORDS: ReadonlySet<string> = new Set(["exit", "quit"]);

export interface ChatOptions {
  /** First message; without one the user is asked. */
  readonly message?: string;
  /** Forget the saved conversation first. */
  readonly fresh: boolean;
}

/**
 * Conversation with the model, continued from the saved one. Answers are
 * printed and never run. Ends at end of input or on "exit".
 */
export async function chat(session: Session, options: ChatOptions): Promise<number> {
  const { model, chatStore, terminal, logger } = session;
  const pc = terminal.colors;
  const prompt = `${pc.cyan("You")}: `;

  if (options.fresh) {
    await chatStore?.clear();
    terminal.print(pc.dim("Started a new chat."));
  }
  const conversation: ChatMessage[] = options.fresh ? [] : ((await chatStore?.load()) ?? []);
  logger.debug(`chat with ${conversation.length} saved message(s)`);

  const reader = lineReader(terminal);
  try {
    let input = options.message ?? (await reader.read(prompt));
    while (input !== undefined && !EXIT_WORDS.has(input.trim().toLowerCase())) {
      const message = input.trim();
      if (message) {
        conversation.push({ role: "user", content: message });
        const answer = await model.chat(trimConversation(conversation, MAX_CHAT_WORDS));
        conversation.push({ role: "assistant", content: answer });
        await chatStore?.save(conversation);
        terminal.print(`${pc.green("AI")}: ${answer}`);
      }
      input = await reader.read(prompt);
    }
  } finally {
    reader.close();
  }
  return 0;
}
