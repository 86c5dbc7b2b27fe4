import { CHAT_MODES, DEFAULT_MODE, MODE_SYNONYMS, type ChatMode } from './mode.config';

// Label → mode lookup built once; a Map keeps prototype keys like "constructor" out
const LABEL_TO_MODE: ReadonlyMap<string, ChatMode> = new Map(
    CHAT_MODES.flatMap((mode) => MODE_SYNONYMS[mode].map((label): [string, ChatMode] => [label, mode])),
);

/**
 * Normalizes a free-form mode label to one of the supported modes.
 * Unrecognized, empty or missing labels resolve to the default mode.
 */
export function resolveMode(label?: string | null): ChatMode {
    const normalized = (label ?? '').trim().toLowerCase();
    return LABEL_TO_MODE.get(normalized) ?? DEFAULT_MODE;
}
