/**
 * Strip diacritics/accents from a string
 * e.g., "Ólafur" → "Olafur", "Björk" → "Bjork"
 */
function stripDiacritics(str: string): string {
    return str.normalize("NFD").replace(/[\u0300-\u036f]/g, "");
}

/**
 * Normalize an artist credit for comparison
 * - Lowercases and trims
 * - Strips diacritics (Ólafur → olafur)
 * - Normalizes "&" to "and" (Of Mice & Men → of mice and men)
 * - Collapses whitespace
 */
export function normalizeArtistName(name: string): string {
    let normalized = stripDiacritics(name.trim().toLowerCase());

    normalized = normalized.replace(/\s*&\s*/g, " and ");
    normalized = normalized.replace(/\s+/g, " ");

    return normalized.trim();
}

export function isSameArtist(left: string, right: string): boolean {
    return normalizeArtistName(left) === normalizeArtistName(right);
}
