export { build_program, resolve_action, run_cli } from "./program.js";
export { create_readline_prompt, parse_leniency, prompt_heartbeat_draft } from "./prompts.js";
export type { CliAction, CliDeps } from "./program.js";
export type { PromptFn, ReadlinePrompt } from "./prompts.js";
