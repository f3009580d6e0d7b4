// ABOUTME: Human-readable rendering of file sizes and modification times
// ABOUTME: Sizes use binary 1024-based units with two decimals; times are absolute local timestamps

const UNITS = ['KiB', 'MiB', 'GiB', 'TiB', 'PiB'] as const;

/**
 * @example
 * formatSize(512)        // => '512 B'
 * formatSize(1536)       // => '1.50 KiB'
 * formatSize(5242880)    // => '5.00 MiB'
 */
export function formatSize(bytes: number): string {
	if (bytes < 1024) {
		return `${bytes} B`;
	}

	let value = bytes / 1024;
	let unit = 0;
	while (value >= 1024 && unit < UNITS.length - 1) {
		value /= 1024;
		unit++;
	}
	return `${value.toFixed(2)} ${UNITS[unit]}`;
}

function pad(n: number): string {
	return String(n).padStart(2, '0');
}

/**
 * Formats a date in the local time zone as `YYYY-MM-DD HH:MM:SS`.
 */
export function formatTimestamp(date: Date): string {
	return (
		`${date.getFullYear()}-${pad(date.getMonth() + 1)}-${pad(date.getDate())} ` +
		`${pad(date.getHours())}:${pad(date.getMinutes())}:${pad(date.getSeconds())}`
	);
}
