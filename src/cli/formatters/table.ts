export interface Column<T> {
	title: string;
	value: (row: T) => string;
	align?: 'left' | 'right';
}

export function formatTable<T>(data: readonly T[], columns: Column<T>[]): string {
	if (data.length === 0) {
		return 'No data';
	}

	const cells = data.map(row => columns.map(col => col.value(row)));

	// Calculate column widths
	const widths = columns.map((col, i) =>
		Math.max(col.title.length, ...cells.map(row => row[i].length))
	);

	const header = columns.map((col, i) => pad(col.title, widths[i], 'left')).join('  ');
	const separator = widths.map(w => '─'.repeat(w)).join('  ');
	const rows = cells.map(row =>
		row.map((cell, i) => pad(cell, widths[i], columns[i].align ?? 'left')).join('  ').trimEnd()
	);

	return [header.trimEnd(), separator, ...rows].join('\n');
}

function pad(str: string, width: number, align: 'left' | 'right'): string {
	if (str.length >= width) {
		return str;
	}
	const padding = ' '.repeat(width - str.length);
	return align === 'right' ? padding + str : str + padding;
}
