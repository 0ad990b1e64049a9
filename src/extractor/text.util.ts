/** Trims and collapses runs of whitespace to single spaces. */
export function cleanText(text: string | undefined | null): string {
    return text ? text.trim().replace(/\s+/g, ' ') : '';
}

/** Cuts `text` to at most `max` characters, ending with an ellipsis when cut. */
export function truncate(text: string, max: number): string {
    if (text.length <= max) {
        return text;
    }
    return `${text.slice(0, Math.max(0, max - 1))}…`;
}
