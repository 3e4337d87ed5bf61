/**
 * StatusParser — `status --json` → {@link StatusFragment}
 *
 * Tolerates missing fields (placeholders are substituted) and fails only
 * when the payload is not JSON or a present field has the wrong shape.
 * On failure the caller keeps the previous snapshot.
 *
 * @module
 */
import { fail, succeed, type Result } from '../result.js';
import { UNKNOWN, type Peer, type StatusFragment } from './Snapshot.js';
import { StatusSchema, type PeerStatus } from './StatusSchema.js';

export type StatusParseErrorKind = 'syntax' | 'shape';

export class StatusParseError extends Error {
    readonly kind: StatusParseErrorKind;
    /** Validation issues as `path: message` lines (empty for syntax errors) */
    readonly issues: readonly string[];

    constructor(kind: StatusParseErrorKind, message: string, issues: readonly string[] = []) {
        super(message);
        this.name = 'StatusParseError';
        this.kind = kind;
        this.issues = Object.freeze([...issues]);
    }
}

/**
 * Parse the stdout of the status query.
 *
 * @example
 * ```typescript
 * const parsed = parseStatus(result.stdout);
 * if (parsed.ok) console.log(parsed.value.peers.length);
 * ```
 */
export function parseStatus(raw: string): Result<StatusFragment, StatusParseError> {
    let data: unknown;
    try {
        data = JSON.parse(raw);
    } catch (err) {
        const detail = err instanceof Error ? err.message : String(err);
        return fail(new StatusParseError('syntax', `Status output is not JSON: ${detail}`));
    }

    const parsed = StatusSchema.safeParse(data);
    if (!parsed.success) {
        const issues = parsed.error.issues.map(i => `${i.path.join('.') || '(root)'}: ${i.message}`);
        return fail(new StatusParseError(
            'shape',
            `Unexpected status payload (${issues[0] ?? 'invalid'})`,
            issues,
        ));
    }

    const status = parsed.data;
    const peerEntries = Object.values(status.Peer ?? {});
    const peers = peerEntries.map(toPeer).sort(comparePeers);

    const activePeer = peerEntries.find(p => p.ExitNode === true);
    const activeFromPeer = activePeer ? firstAddress(activePeer.TailscaleIPs) : undefined;
    const activeFromStatus = firstAddress(status.ExitNodeStatus?.TailscaleIPs);
    const activeExitNode = activeFromPeer ?? activeFromStatus ?? null;

    return succeed({
        localAddress: firstAddress(status.Self?.TailscaleIPs) ?? UNKNOWN,
        selfHostname: status.Self ? hostnameOf(status.Self) : UNKNOWN,
        backendState: status.BackendState || UNKNOWN,
        tailnet: status.CurrentTailnet?.Name || UNKNOWN,
        peers,
        exitNodeCandidates: peers.filter(p => p.exitNodeCapable),
        activeExitNode,
    });
}

// ── Internal ─────────────────────────────────────────────

function toPeer(status: PeerStatus): Peer {
    return {
        hostname: hostnameOf(status),
        address: firstAddress(status.TailscaleIPs) ?? UNKNOWN,
        online: status.Online ?? false,
        exitNodeCapable: (status.ExitNodeOption ?? false) || (status.ExitNode ?? false),
        os: status.OS || UNKNOWN,
    };
}

function hostnameOf(status: PeerStatus): string {
    if (status.HostName) return status.HostName;
    const label = status.DNSName?.split('.')[0];
    return label || UNKNOWN;
}

/** First address, without any `/32` style prefix length. */
function firstAddress(addresses: readonly string[] | null | undefined): string | undefined {
    const first = addresses?.find(a => a.length > 0);
    if (first === undefined) return undefined;
    const slash = first.indexOf('/');
    return slash === -1 ? first : first.slice(0, slash);
}

function comparePeers(a: Peer, b: Peer): number {
    return compareText(a.hostname.toLowerCase(), b.hostname.toLowerCase())
        || compareText(a.address, b.address);
}

function compareText(a: string, b: string): number {
    if (a < b) return -1;
    if (a > b) return 1;
    return 0;
}
