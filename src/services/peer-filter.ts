import { DEFAULT_VALUES } from '@/config/constants';
import { FilteredPeerGroup, PeerEndpoint, PeerRecord } from '@/types';
import { PeerAddressError } from '@/utils/errors';

export interface PeerFilterOptions {
	minVersion?: string;
	heightWindow?: number;
}

export function isIpv6Address(addr: string): boolean {
	return addr.startsWith('[');
}

/**
 * Splits `addr` into host and port. IPv6 hosts are bracketed (`[::1]:51472`),
 * everything else is `host:port`.
 */
export function parsePeerAddress(addr: string): PeerEndpoint {
	if (isIpv6Address(addr)) {
		const close = addr.indexOf(']:');
		if (close === -1) {
			throw new PeerAddressError(addr, "bracketed host without ']:port' suffix");
		}
		return { ip: addr.slice(1, close), port: addr.slice(close + 2) };
	}

	const colon = addr.lastIndexOf(':');
	if (colon === -1) {
		throw new PeerAddressError(addr, 'missing port separator');
	}
	return { ip: addr.slice(0, colon), port: addr.slice(colon + 1) };
}

/**
 * Keeps peers that run at least `minVersion` and started close enough to the
 * current tip, grouped by version string in first-seen order.
 *
 * The version check is a plain string comparison, so "DIVI Core: 10.0.0.0"
 * sorts below "DIVI Core: 3.0.0.0".
 */
export function filterPeers(
	peers: readonly PeerRecord[],
	currentHeight: number,
	includeIpv6: boolean,
	options: PeerFilterOptions = {}
): FilteredPeerGroup[] {
	const minVersion = options.minVersion ?? DEFAULT_VALUES.PEER_MIN_VERSION;
	const minHeight = currentHeight - (options.heightWindow ?? DEFAULT_VALUES.PEER_HEIGHT_WINDOW);
	const groups = new Map<string, PeerEndpoint[]>();

	for (const peer of peers) {
		if (!includeIpv6 && isIpv6Address(peer.addr)) continue;

		const endpoint = parsePeerAddress(peer.addr);
		if (peer.subver < minVersion || peer.startingheight < minHeight) continue;

		const group = groups.get(peer.subver);
		if (group) {
			group.push(endpoint);
		} else {
			groups.set(peer.subver, [endpoint]);
		}
	}

	return Array.from(groups, ([core, endpoints]) => ({ core, peers: endpoints }));
}
