/**
 * Direction of a perpetual position. A long is opened by buying and closed
 * by selling; a short the other way round.
 */
export const PositionSide = {
	Long: "long",
	Short: "short",
} as const;

export type PositionSide = (typeof PositionSide)[keyof typeof PositionSide];

export function isPositionSide(value: string): value is PositionSide {
	return value === PositionSide.Long || value === PositionSide.Short;
}

export function oppositeSide(side: PositionSide): PositionSide {
	return side === PositionSide.Long ? PositionSide.Short : PositionSide.Long;
}

/** Whether an order on this side buys (`true`) or sells (`false`). */
export function isBuy(side: PositionSide): boolean {
	return side === PositionSide.Long;
}

/** Side of a signed position size; `null` when flat. */
export function sideOfPosition(signedSize: { isPositive(): boolean; isNegative(): boolean }): PositionSide | null {
	if (signedSize.isPositive()) return PositionSide.Long;
	if (signedSize.isNegative()) return PositionSide.Short;
	return null;
}
