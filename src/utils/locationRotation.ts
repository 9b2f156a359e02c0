/**
 * src/utils/locationRotation.ts
 *
 * Picks the subset of metro locations searched on a given run.
 *
 * Each run covers a contiguous circular window of the configured list,
 * starting at `seed mod length`. The default seed is the current UTC hour,
 * so every run inside the same hour samples the same metros and the window
 * walks across the full list over the course of a day.
 */

export function defaultRotationSeed(now: Date = new Date()): number {
    return now.getUTCHours();
}

export function rotateLocations<T>(all: readonly T[], size: number, seed: number): T[] {
    const total = all.length;
    if (total === 0 || size <= 0) return [];
    if (size >= total) return [...all];

    const start = ((Math.trunc(seed) % total) + total) % total;
    const rotated = [...all.slice(start), ...all.slice(0, start)];
    return rotated.slice(0, Math.floor(size));
}
