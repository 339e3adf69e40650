import { confirm, input } from "@inquirer/prompts";

export async function confirmPublish(message: string): Promise<boolean> {
  return confirm({
    message,
    default: true,
  });
}

export async function promptCommitMessage(defaultMessage: string): Promise<string> {
  const message = await input({
    message: "Commit message:",
    default: defaultMessage,
    validate: (value: string) => {
      if (!value.trim()) {
        return "Commit message is required";
      }
      return true;
    },
  });
  return message.trim();
}
