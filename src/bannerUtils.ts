/**
 * Centre a title inside a line of `char`.
 *
 * @example
 * createBanner("RANKING (2)", 30)
 * // Returns: "======== RANKING (2) ========="
 */
export function createBanner(title: string, width: number = 60, char: string = "="): string {
    if (title.length === 0) {
        return char.repeat(width);
    }

    // titles wider than the banner still get two rule characters per side
    const label = ` ${title} `;
    const left = Math.max(2, Math.floor((width - label.length) / 2));
    const right = Math.max(2, width - label.length - left);

    return `${char.repeat(left)}${label}${char.repeat(right)}`;
}

/**
 * Frame a block of lines between a titled banner and a closing rule.
 *
 * @example
 * bannerSection("LEADERS", ["  • pg", "  • scylla"], 30)
 * // [
 * //   "========== LEADERS ===========",
 * //   "  • pg",
 * //   "  • scylla",
 * //   "==============================",
 * // ]
 */
export function bannerSection(title: string, lines: string[], width: number = 60): string[] {
    return [createBanner(title, width, "="), ...lines, createBanner("", width, "=")];
}
