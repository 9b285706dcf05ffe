export { createFzfPicker, fzfArgs, type FzfPickerOptions } from "./fzf-picker.js";
export { commandExists } from "./which.js";
export { openInPager, openInEditor, type LaunchOptions } from "./launch.js";
export {
  runWithInput,
  runInteractive,
  splitCommandLine,
  type RunWithInput,
  type RunInteractive,
  type ProcessResult,
} from "./process.js";
