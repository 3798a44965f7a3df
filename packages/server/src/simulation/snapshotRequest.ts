import type { ReportRequest } from '@shared/reporter';
import type { SnapshotRequest } from '@shared/types';

/**
 * Merges the needs of every reporter due at a step into the one snapshot
 * fetched for that step.
 */
export function combineRequests(requests: readonly ReportRequest[], wrapPositions: boolean): SnapshotRequest {
    const combined: SnapshotRequest = {
        positions: false,
        velocities: false,
        forces: false,
        energy: false,
        wrapPositions,
    };
    for (const request of requests) {
        combined.positions ||= request.positions;
        combined.velocities ||= request.velocities;
        combined.forces ||= request.forces;
        combined.energy ||= request.energy;
    }
    return combined;
}
