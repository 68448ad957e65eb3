const MONTHS = ['Jan', 'Feb', 'March', 'April', 'May', 'June', 'July', 'Aug', 'Sept', 'Oct', 'Nov', 'Dec'];

function ordinalSuffix(day: number): string {
    if (day >= 11 && day <= 13) return 'th';
    switch (day % 10) {
        case 1: return 'st';
        case 2: return 'nd';
        case 3: return 'rd';
        default: return 'th';
    }
}

/**
 * Human-readable UTC timestamp for page footers, e.g. `Sept 27th, 2025 @ 4:13pm`.
 */
export function formatHumanTime(date: Date): string {
    const day = date.getUTCDate();
    const hour = date.getUTCHours();
    const hour12 = hour % 12 === 0 ? 12 : hour % 12;
    const amPm = hour < 12 ? 'am' : 'pm';
    const minutes = String(date.getUTCMinutes()).padStart(2, '0');

    return `${MONTHS[date.getUTCMonth()]} ${day}${ordinalSuffix(day)}, ${date.getUTCFullYear()} @ ${hour12}:${minutes}${amPm}`;
}
