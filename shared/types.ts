import type { Packet } from "./packet.js";

/** Invoked with every packet decoded from inbound traffic. */
export type PacketCallback = (packet: Packet) => void | Promise<void>;

/**
 * What an HTTP tunnel does when `send` would push its egress past the limit:
 *  - "reject": throw EgressOverflowError, queue nothing
 *  - "drop-oldest": discard whole queued packets, oldest first, until it fits
 */
export type OverflowPolicy = "reject" | "drop-oldest";

export const OVERFLOW_POLICIES = ["reject", "drop-oldest"] as const satisfies readonly OverflowPolicy[];
