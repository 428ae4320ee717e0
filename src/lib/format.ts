export function formatUsd(value: number, digits = 4): string {
    return `$${value.toFixed(digits)}`;
}

export function formatPct(value: number): string {
    return `${(value * 100).toFixed(2)}%`;
}

export function formatDurationMs(totalMs: number): string {
    if (!Number.isFinite(totalMs) || totalMs < 0) return '0ms';
    if (totalMs < 1000) return `${Math.floor(totalMs)}ms`;
    const totalSeconds = Math.floor(totalMs / 1000);
    const s = totalSeconds % 60;
    const totalMinutes = Math.floor(totalSeconds / 60);
    const m = totalMinutes % 60;
    const h = Math.floor(totalMinutes / 60);
    const parts: string[] = [];
    if (h) parts.push(`${h}h`);
    if (m) parts.push(`${m}m`);
    if (s || parts.length === 0) parts.push(`${s}s`);
    return parts.join(' ');
}
