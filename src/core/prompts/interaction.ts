import { cancel, isCancel } from "@clack/prompts";

import { OperationCancelledError } from "../errors.js";

function unwrapPrompt<T>(value: T | symbol): T {
  if (isCancel(value)) {
    cancel("Project creation canceled.");
    throw new OperationCancelledError("Project creation canceled.", { reported: true });
  }

  return value;
}

export { unwrapPrompt };
