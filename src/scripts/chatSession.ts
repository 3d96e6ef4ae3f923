/**
 * Interactive grounded chat over a collection.
 *
 *   npm run chat -- [collection]
 *
 * Answers stream to stdout as they are generated; type "exit" to quit.
 */
import readline from "readline/promises";

import { ChatSession, isExitCommand } from "@app/chat/ChatSession";
import { createContainer } from "@app/container";
import { errorMessage, NoGroundingFoundError } from "@domain/errors";
import { parseChatArgs } from "@scripts/args";

async function run(): Promise<void> {
  const { collection } = parseChatArgs(process.argv);
  const container = createContainer();
  const session = new ChatSession(container.responder, { collection });
  const rl = readline.createInterface({
    input: process.stdin,
    output: process.stdout,
  });

  session.start();
  console.log(
    `Ask about "${collection ?? container.collection.name}". Type "exit" to quit.`
  );

  try {
    for (;;) {
      const input = await rl.question("\nYou: ");

      if (isExitCommand(input)) {
        break;
      }
      if (!input.trim()) {
        continue;
      }

      process.stdout.write("Assistant: ");
      try {
        await session.ask(input, {
          onFragment: (fragment) => process.stdout.write(fragment),
        });
        process.stdout.write("\n");
      } catch (err: unknown) {
        if (err instanceof NoGroundingFoundError) {
          process.stdout.write("I don't know: nothing stored matches that.\n");
        } else {
          process.stdout.write("\n");
          console.error("Chat error:", errorMessage(err));
        }
      }
    }
  } finally {
    session.close();
    rl.close();
    await container.close();
  }
}

run().catch((err: unknown) => {
  console.error("Chat session error:", errorMessage(err));
  process.exitCode = 1;
});
