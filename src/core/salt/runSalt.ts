import { spawn } from "child_process";

export interface SaltProcessResult {
  code: number | null;
  stdout: string;
  stderr: string;
}

export type SaltRunner = (
  binary: string,
  args: string[],
) => Promise<SaltProcessResult>;

// Salt exits nonzero for failed states and unreachable minions, so the exit
// code is handed back rather than turned into a rejection.
export const runSalt: SaltRunner = (binary, args) => {
  return new Promise((resolve, reject) => {
    const child = spawn(binary, args, {
      stdio: ["ignore", "pipe", "pipe"],
    });

    let stdout = "";
    let stderr = "";

    child.stdout.on("data", (data) => {
      stdout += data.toString();
    });

    child.stderr.on("data", (data) => {
      stderr += data.toString();
    });

    child.on("close", (code) => {
      resolve({ code, stdout: stdout.trim(), stderr: stderr.trim() });
    });

    child.on("error", (err) => {
      reject(new Error(`Failed to run ${binary}: ${err.message}`));
    });
  });
};
