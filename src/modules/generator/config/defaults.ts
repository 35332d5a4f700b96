export const DEFAULT_WIDTH = 128;
export const DEFAULT_HEIGHT = 128;
export const DEFAULT_OCTAVE = 1;

// Amplitude falloff between consecutive octaves
export const PERSISTENCE = 0.5;
