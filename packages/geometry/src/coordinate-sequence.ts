/**
 * Immutable coordinate storage.
 *
 * Positions are packed into a single `Float64Array`, `dimension` ordinates per
 * position. Every sequence has one dimension for all of its positions.
 *
 * @module
 */

import { assertIndex } from "@geocodec/shared/assert"
import type { Dimension, Position } from "@geocodec/shared/types"

export class CoordinateSequence implements Iterable<Position> {
	readonly dimension: Dimension
	private readonly ordinates: Float64Array

	/**
	 * Build a sequence from positions. The dimension of the first position is
	 * used for the whole sequence; an empty sequence is two-dimensional.
	 *
	 * @throws Error if positions mix 2D and 3D tuples or an ordinate is not
	 * finite.
	 */
	static from(positions: readonly Position[]): CoordinateSequence {
		const dimension: Dimension = positions[0]?.length === 3 ? 3 : 2
		const ordinates = new Float64Array(positions.length * dimension)
		positions.forEach((position, i) => {
			if (position.length !== dimension) {
				throw Error(
					`Position ${i} has ${position.length} ordinates, expected ${dimension}`,
				)
			}
			ordinates.set(position, i * dimension)
		})
		return new CoordinateSequence(ordinates, dimension)
	}

	static empty(dimension: Dimension = 2): CoordinateSequence {
		return new CoordinateSequence([], dimension)
	}

	/**
	 * Build a sequence from packed ordinates. The ordinates are copied.
	 *
	 * @throws Error if the count does not fill whole positions or an ordinate
	 * is not finite.
	 */
	constructor(ordinates: ArrayLike<number>, dimension: Dimension) {
		if (ordinates.length % dimension !== 0) {
			throw Error(
				`Ordinate count ${ordinates.length} is not a multiple of dimension ${dimension}`,
			)
		}
		const copy = Float64Array.from(ordinates)
		copy.forEach((value, i) => {
			if (!Number.isFinite(value)) {
				throw Error(
					`Ordinate ${i % dimension} of position ${Math.floor(i / dimension)} is not finite: ${value}`,
				)
			}
		})
		this.dimension = dimension
		this.ordinates = copy
	}

	/** Number of positions. */
	get size(): number {
		return this.ordinates.length / this.dimension
	}

	isEmpty(): boolean {
		return this.ordinates.length === 0
	}

	getOrdinate(index: number, ordinate: number): number {
		assertIndex(index, this.size)
		assertIndex(ordinate, this.dimension)
		return this.ordinates[index * this.dimension + ordinate] ?? Number.NaN
	}

	getX(index: number): number {
		return this.getOrdinate(index, 0)
	}

	getY(index: number): number {
		return this.getOrdinate(index, 1)
	}

	/** Elevation of a position, or undefined for 2D sequences. */
	getZ(index: number): number | undefined {
		return this.dimension === 3 ? this.getOrdinate(index, 2) : undefined
	}

	get(index: number): Position {
		const x = this.getX(index)
		const y = this.getY(index)
		const z = this.getZ(index)
		return z === undefined ? [x, y] : [x, y, z]
	}

	toPositions(): Position[] {
		return Array.from(this)
	}

	*[Symbol.iterator](): Iterator<Position> {
		for (let i = 0; i < this.size; i++) yield this.get(i)
	}

	/**
	 * Exact, ordinate-wise equality. Sequences of different dimensions are
	 * never equal.
	 */
	equals(other: CoordinateSequence): boolean {
		if (this === other) return true
		if (this.dimension !== other.dimension) return false
		if (this.ordinates.length !== other.ordinates.length) return false
		for (let i = 0; i < this.ordinates.length; i++) {
			if (this.ordinates[i] !== other.ordinates[i]) return false
		}
		return true
	}
}
