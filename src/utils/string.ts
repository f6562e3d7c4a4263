/**
 * Shared string utilities.
 */

/**
 * Cut at `end` UTF-16 units, one unit earlier when the cut would split a
 * surrogate pair.
 */
function sliceWhole(text: string, end: number): string {
    const code = text.charCodeAt(end - 1);
    const splitsPair = end > 0 && end < text.length && code >= 0xd800 && code <= 0xdbff;
    return text.substring(0, splitsPair ? end - 1 : end);
}

/**
 * Truncate text to a maximum length, appending "..." if truncated.
 * The result never exceeds `maxLength`; it is one shorter when the cut lands
 * inside an emoji or other astral character.
 */
export function truncateText(text: string, maxLength: number = 100): string {
    if (text.length <= maxLength) {
        return text;
    }
    if (maxLength <= 3) {
        return sliceWhole(text, maxLength);
    }
    return `${sliceWhole(text, maxLength - 3)}...`;
}
