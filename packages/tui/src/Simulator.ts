/**
 * Simulator — In-Process Stand-In for the VPN Client CLI
 *
 * A {@link CommandRunner} that answers the subcommands the dashboard
 * issues from a small fake tailnet, so the dashboard can be demoed
 * (`meshtop --demo`) and tested without a VPN installed. Fully
 * deterministic: peer state changes with the number of status calls,
 * never with the clock.
 *
 * @module
 */
import type { CommandResult, CommandRunner, RunOptions } from '@meshtop/core';

interface SimulatedPeer {
    readonly hostname: string;
    readonly address: string;
    readonly os: string;
    readonly exitNodeOption: boolean;
    /** Online unless the status call count is a multiple of this */
    readonly flapEvery: number;
    readonly alwaysOffline?: boolean;
    readonly relay: string;
}

const SELF = { hostname: 'workstation', address: '100.64.0.1', os: 'linux' } as const;

const PEERS: readonly SimulatedPeer[] = [
    { hostname: 'gateway', address: '100.64.0.2', os: 'linux', exitNodeOption: true, flapEvery: 0, relay: 'fra' },
    { hostname: 'nas', address: '100.64.0.3', os: 'linux', exitNodeOption: false, flapEvery: 0, relay: 'fra' },
    { hostname: 'build-box', address: '100.64.0.4', os: 'linux', exitNodeOption: false, flapEvery: 4, relay: 'ams' },
    { hostname: 'laptop', address: '100.64.0.5', os: 'macOS', exitNodeOption: false, flapEvery: 0, alwaysOffline: true, relay: 'lhr' },
    { hostname: 'phone', address: '100.64.0.6', os: 'iOS', exitNodeOption: false, flapEvery: 3, relay: 'fra' },
    { hostname: 'vps-nyc', address: '100.64.0.7', os: 'linux', exitNodeOption: true, flapEvery: 0, relay: 'nyc' },
];

export interface SimulatorOptions {
    /** Simulated command latency (default 40ms; 0 answers synchronously) */
    readonly latencyMs?: number | undefined;
}

/**
 * A fake tailnet. `run` is the runner; the rest is inspection for tests.
 *
 * @example
 * ```typescript
 * const tailnet = new SimulatedTailnet();
 * const scheduler = new RefreshScheduler({ runner: tailnet.run, config });
 * ```
 */
export class SimulatedTailnet {
    private readonly _latencyMs: number;
    private _statusCalls = 0;
    private _exitNode: string | null = null;

    constructor(options: SimulatorOptions = {}) {
        this._latencyMs = options.latencyMs ?? 40;
    }

    /** Address of the exit node currently in use. */
    get exitNode(): string | null { return this._exitNode; }

    get statusCalls(): number { return this._statusCalls; }

    readonly run: CommandRunner = (_command: string, args: readonly string[], _options: RunOptions) => {
        const result = this._answer(args);
        if (this._latencyMs <= 0) return Promise.resolve(result);
        return new Promise<CommandResult>((resolve) => {
            setTimeout(() => resolve(result), this._latencyMs);
        });
    };

    // ── Subcommands ──────────────────────────────────────

    private _answer(args: readonly string[]): CommandResult {
        const [subcommand, ...rest] = args;
        switch (subcommand) {
            case 'status':
                return rest[0] === '--json' ? this._status() : exitFailure('status: only --json is simulated');
            case 'netcheck':
                return ok(NETCHECK_REPORT);
            case 'ping':
                return this._ping(rest);
            case 'exit-node':
                return rest[0] === 'list' ? this._exitNodeList() : exitFailure(`exit-node: unknown subcommand "${rest[0] ?? ''}"`);
            case 'set':
                return this._set(rest);
            default:
                return exitFailure(`unknown subcommand "${subcommand ?? ''}"`);
        }
    }

    private _status(): CommandResult {
        this._statusCalls++;
        const tick = this._statusCalls;
        const peers: Record<string, unknown> = {};

        PEERS.forEach((peer, i) => {
            peers[`nodekey:${String(i + 1).padStart(4, '0')}`] = {
                HostName: peer.hostname,
                DNSName: `${peer.hostname}.demo-tailnet.ts.net.`,
                TailscaleIPs: [peer.address],
                OS: peer.os,
                Online: isOnline(peer, tick),
                ExitNode: peer.address === this._exitNode,
                ExitNodeOption: peer.exitNodeOption,
                Relay: peer.relay,
            };
        });

        return ok(JSON.stringify({
            Version: '1.70.0-simulated',
            BackendState: 'Running',
            Self: {
                HostName: SELF.hostname,
                DNSName: `${SELF.hostname}.demo-tailnet.ts.net.`,
                TailscaleIPs: [SELF.address],
                OS: SELF.os,
                Online: true,
            },
            CurrentTailnet: { Name: 'demo-tailnet' },
            Peer: peers,
        }, null, 2));
    }

    private _ping(args: readonly string[]): CommandResult {
        let count = 10;
        let target: string | undefined;
        for (let i = 0; i < args.length; i++) {
            const arg = args[i];
            if (arg === '--c') count = Number(args[++i] ?? count);
            else target = arg;
        }

        const peer = PEERS.find((p) => p.address === target);
        if (!peer) return exitFailure(`no matching peer for ${target ?? '(none)'}`);
        if (!isOnline(peer, this._statusCalls)) {
            const lines = Array.from({ length: count }, () => `timeout waiting for ping reply from ${peer.address}`);
            return exitFailure('no reply', lines.join('\n') + '\n');
        }

        const lines = Array.from({ length: count }, (_, i) =>
            `pong from ${peer.hostname} (${peer.address}) via DERP(${peer.relay}) in ${20 + peer.relay.length * 3 + i}ms`);
        return ok(lines.join('\n') + '\n');
    }

    private _exitNodeList(): CommandResult {
        const rows = PEERS.filter((p) => p.exitNodeOption).map((p) =>
            ` ${p.address.padEnd(12)} ${`${p.hostname}.demo-tailnet.ts.net`.padEnd(32)} ${
                (isOnline(p, this._statusCalls) ? (p.address === this._exitNode ? 'selected' : '-') : 'offline')}`);
        return ok([
            ` ${'IP'.padEnd(12)} ${'HOSTNAME'.padEnd(32)} STATUS`,
            ...rows,
            '',
            '# To use an exit node: tailscale set --exit-node=<ip>',
        ].join('\n') + '\n');
    }

    private _set(args: readonly string[]): CommandResult {
        const flag = args.find((a) => a.startsWith('--exit-node='));
        if (flag === undefined) return exitFailure('set: only --exit-node is simulated');

        const value = flag.slice('--exit-node='.length);
        if (value === '') {
            this._exitNode = null;
            return ok('');
        }
        const peer = PEERS.find((p) => p.address === value);
        if (!peer || !peer.exitNodeOption) {
            return exitFailure(`invalid value "${value}" for --exit-node: node is not an exit node`);
        }
        this._exitNode = peer.address;
        return ok('');
    }
}

// ============================================================================
// Helpers
// ============================================================================

function isOnline(peer: SimulatedPeer, tick: number): boolean {
    if (peer.alwaysOffline) return false;
    return peer.flapEvery === 0 || tick % peer.flapEvery !== 0;
}

function ok(stdout: string): CommandResult {
    return { ok: true, stdout, stderr: '', durationMs: 0 };
}

function exitFailure(stderr: string, stdout = ''): CommandResult {
    return {
        ok: false,
        reason: 'exit',
        message: `tailscale exited with code 1: ${stderr}`,
        stdout,
        stderr: stderr + '\n',
        exitCode: 1,
        durationMs: 0,
    };
}

const NETCHECK_REPORT = [
    '',
    'Report:',
    '\t* UDP: true',
    '\t* IPv4: yes, 203.0.113.10:41641',
    '\t* IPv6: no, but OS has support',
    '\t* MappingVariesByDestIP: false',
    '\t* PortMapping: UPnP',
    '\t* Nearest DERP: Frankfurt',
    '\t* DERP latency:',
    '\t\t- fra: 9.8ms   (Frankfurt)',
    '\t\t- ams: 14.1ms  (Amsterdam)',
    '\t\t- lhr: 18.6ms  (London)',
    '\t\t- nyc: 84.2ms  (New York City)',
    '',
].join('\n');
