import type { ProjectEntity, TrackDefinition } from '../types/index.js';
import { ConfigurationError } from '../utils/errors.js';
import { normalizeLabel } from '../utils/text.js';

/**
 * Look up a named track. Unknown names are a setup error.
 */
export function resolveTrack(
    name: string,
    tracks: ReadonlyMap<string, TrackDefinition>
): TrackDefinition {
    const track = tracks.get(name);
    if (!track) {
        throw new ConfigurationError(`Unknown track "${name}"`, [
            `known tracks: ${[...tracks.keys()].join(', ') || '(none)'}`,
        ]);
    }
    return track;
}

/**
 * Whether an entity belongs to a track. A track without a field matches
 * everything; otherwise any of the entity's values for that field must equal
 * one of `equals` or contain `contains` (case-insensitive).
 */
export function matchesTrack(entity: ProjectEntity, track: TrackDefinition): boolean {
    if (track.field === undefined) return true;

    const display = entity.fields[track.field];
    const candidates = entity.variants[track.field] ?? (display === null || display === undefined ? [] : [String(display)]);
    const equals = (track.equals ?? []).map(normalizeLabel);
    const contains = track.contains === undefined ? null : normalizeLabel(track.contains);

    return candidates.some((candidate) => {
        const value = normalizeLabel(candidate);
        return equals.includes(value) || (contains !== null && value.includes(contains));
    });
}
