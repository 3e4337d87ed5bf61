/**
 * Snapshot — Immutable View of the Mesh at One Refresh Cycle
 *
 * Produced once per successful refresh cycle, deep-frozen before it is
 * published, and replaced wholesale by the next one.
 *
 * @module
 */

/** Placeholder for any required text field the VPN client left out. */
export const UNKNOWN = 'unknown';

/** One other device visible through the mesh. Identity is `address`. */
export interface Peer {
    readonly hostname: string;
    /** First VPN-assigned address, or {@link UNKNOWN} */
    readonly address: string;
    readonly online: boolean;
    readonly exitNodeCapable: boolean;
    readonly os: string;
}

/** What the Status Parser extracts from one status payload. */
export interface StatusFragment {
    readonly localAddress: string;
    readonly selfHostname: string;
    readonly backendState: string;
    readonly tailnet: string;
    readonly peers: readonly Peer[];
    readonly exitNodeCandidates: readonly Peer[];
    /** Address of the exit node currently routing our traffic */
    readonly activeExitNode: string | null;
}

export interface Snapshot extends StatusFragment {
    /** Raw diagnostics output, for display only */
    readonly diagnostics: string;
    /** Epoch ms when the snapshot was built */
    readonly capturedAt: number;
}

/**
 * Assemble and deep-freeze a snapshot. Nothing is visible to readers
 * until this returns.
 */
export function createSnapshot(
    fragment: StatusFragment,
    diagnostics: string,
    capturedAt: number,
): Snapshot {
    const peers = Object.freeze(fragment.peers.map(p => Object.freeze({ ...p })));
    const byAddress = new Map(peers.map(p => [p.address, p]));
    const candidates = Object.freeze(
        fragment.exitNodeCandidates.map(c => byAddress.get(c.address) ?? Object.freeze({ ...c })),
    );

    return Object.freeze({
        localAddress: fragment.localAddress,
        selfHostname: fragment.selfHostname,
        backendState: fragment.backendState,
        tailnet: fragment.tailnet,
        peers,
        exitNodeCandidates: candidates,
        activeExitNode: fragment.activeExitNode,
        diagnostics,
        capturedAt,
    });
}

export function findPeer(snapshot: Snapshot, address: string): Peer | undefined {
    return snapshot.peers.find(p => p.address === address);
}

/** True when `address` names a real peer of `snapshot` (never the placeholder). */
export function isKnownPeerAddress(snapshot: Snapshot | undefined, address: string): boolean {
    if (!snapshot || address === UNKNOWN) return false;
    return findPeer(snapshot, address) !== undefined;
}

export function isExitNodeCandidate(snapshot: Snapshot | undefined, address: string): boolean {
    if (!snapshot || address === UNKNOWN) return false;
    return snapshot.exitNodeCandidates.some(p => p.address === address);
}

export function countOnline(peers: readonly Peer[]): number {
    let online = 0;
    for (const peer of peers) if (peer.online) online++;
    return online;
}
