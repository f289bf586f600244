import { execa } from "execa";

export async function getBranchName(cwd: string) {
  const result = await execa("git", ["rev-parse", "--abbrev-ref", "HEAD"], { cwd });
  return result.stdout.trim();
}
