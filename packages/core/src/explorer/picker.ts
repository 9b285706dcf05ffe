export interface PickOptions {
  /** Text the picker starts filtering with. */
  query?: string;
  header?: string;
}

/**
 * An interactive chooser over candidate lines. `pick` resolves to the chosen
 * line, or null when the user cancelled or nothing was chosen.
 */
export interface FuzzyPicker {
  isAvailable(): Promise<boolean>;
  pick(candidates: readonly string[], options?: PickOptions): Promise<string | null>;
}

/** Picker for systems without a fuzzy finder. */
export const unavailablePicker: FuzzyPicker = {
  async isAvailable() {
    return false;
  },
  async pick() {
    return null;
  },
};
