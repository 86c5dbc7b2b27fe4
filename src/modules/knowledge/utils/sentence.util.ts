/**
 * Returns the first `count` sentences of `text`, whitespace collapsed.
 * A trailing fragment without terminal punctuation counts as a sentence.
 */
export function firstSentences(text: string, count: number): string {
    if (count < 1) {
        return '';
    }

    const normalized = text.replace(/\s+/g, ' ').trim();
    const sentences = normalized.match(/[^.!?]+(?:[.!?]+|$)/g) ?? [];

    return sentences
        .slice(0, count)
        .map((sentence) => sentence.trim())
        .filter((sentence) => sentence.length > 0)
        .join(' ');
}
