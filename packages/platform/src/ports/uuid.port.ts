/** biome-ignore-all lint/style/useNamingConvention: UUID follows Effect's convention for acronyms */

import * as Context from 'effect/Context'

/**
 * UUIDPort - raw UUID v7 strings for new message ids
 *
 * v7 ids embed their creation time in the leading bits, so the string form of a message id sorts by enqueue time. The
 * message store relies on that to order messages whose leases expire together.
 *
 * @see {@link ../adapters/uuid.adapter.ts} for `UUID.Default` and `UUID.Sequence`
 */
export class UUIDPort extends Context.Tag('@fifomq/platform/ports/UUID')<
	UUIDPort,
	{
		/** Next id; monotonically increasing within one millisecond */
		readonly randomUUIDv7: () => string
	}
>() {}
