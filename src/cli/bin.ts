import { main } from "./main";

main(process.argv, process.env).then(
  (code) => {
    process.exitCode = code;
  },
  (err: unknown) => {
    console.error(`[chip8] ${err instanceof Error ? err.message : String(err)}`);
    process.exitCode = 1;
  }
);
