/**
 * Zod schema for the subset of `status --json` the dashboard reads.
 *
 * Every field is optional: a missing value becomes a placeholder later.
 * A present value of the wrong type fails validation. Unknown keys are
 * stripped.
 *
 * @module
 */
import { z } from 'zod';

const AddressList = z.array(z.string()).nullish();

export const PeerStatusSchema = z.object({
    HostName: z.string().optional(),
    DNSName: z.string().optional(),
    TailscaleIPs: AddressList,
    Online: z.boolean().optional(),
    OS: z.string().optional(),
    /** Currently routing our traffic */
    ExitNode: z.boolean().optional(),
    /** Offers itself as an exit node */
    ExitNodeOption: z.boolean().optional(),
});

export const StatusSchema = z.object({
    Version: z.string().optional(),
    BackendState: z.string().optional(),
    Self: PeerStatusSchema.nullish(),
    Peer: z.record(z.string(), PeerStatusSchema).nullish(),
    ExitNodeStatus: z.object({
        ID: z.string().optional(),
        Online: z.boolean().optional(),
        TailscaleIPs: AddressList,
    }).nullish(),
    CurrentTailnet: z.object({
        Name: z.string().optional(),
    }).nullish(),
});

export type PeerStatus = z.infer<typeof PeerStatusSchema>;
export type StatusPayload = z.infer<typeof StatusSchema>;
