import { GameError } from './errors.js'
import type { CellEntry, Coord, Direction, PlayerId } from './types.js'

// Upper bound per extent; keeps a board at 65536 cells at most
export const MAX_DIMENSION = 256

// Neighbour order used wherever a deterministic preference is needed
export const NEIGHBOUR_DIRECTIONS: readonly Direction[] = ['left', 'up', 'right', 'down']

const OFFSETS: Record<Direction, Coord> = {
  left: { x: -1, y: 0 },
  up: { x: 0, y: -1 },
  right: { x: 1, y: 0 },
  down: { x: 0, y: 1 },
}

export function moveToward(position: Coord, direction: Direction): Coord {
  const offset = OFFSETS[direction]
  return { x: position.x + offset.x, y: position.y + offset.y }
}

export function manhattan(a: Coord, b: Coord): number {
  return Math.abs(a.x - b.x) + Math.abs(a.y - b.y)
}

// Open 4-neighbourhood: the player's own cell is not a move
export function isAdjacent(from: Coord, to: Coord): boolean {
  return Number.isInteger(to.x) && Number.isInteger(to.y) && manhattan(from, to) === 1
}

export function isValidCoord(coord: Coord, width: number, height: number): boolean {
  return (
    Number.isInteger(coord.x) &&
    Number.isInteger(coord.y) &&
    coord.x >= 0 &&
    coord.y >= 0 &&
    coord.x < width &&
    coord.y < height
  )
}

export function coordToIndex(coord: Coord, width: number): number {
  return coord.x + coord.y * width
}

export function indexToCoord(index: number, width: number): Coord {
  return { x: index % width, y: Math.floor(index / width) }
}

export function sameCoord(a: Coord, b: Coord): boolean {
  return a.x === b.x && a.y === b.y
}

export interface ClaimChange {
  changed: boolean
  previousOwner: PlayerId | null
}

export class Grid {
  readonly width: number
  readonly height: number
  private cells: (CellEntry | null)[]
  private claimed = 0

  constructor(width: number, height: number) {
    if (!Grid.isValidExtent(width) || !Grid.isValidExtent(height)) {
      throw new GameError(
        'invalid_dimensions',
        `Board must be between 1x1 and ${MAX_DIMENSION}x${MAX_DIMENSION}, got ${width}x${height}`
      )
    }
    this.width = width
    this.height = height
    this.cells = Array(width * height).fill(null)
  }

  static isValidExtent(extent: number): boolean {
    return Number.isInteger(extent) && extent >= 1 && extent <= MAX_DIMENSION
  }

  get size(): number {
    return this.width * this.height
  }

  contains(coord: Coord): boolean {
    return isValidCoord(coord, this.width, this.height)
  }

  cellAt(coord: Coord): CellEntry | null {
    const entry = this.cells[this.indexOf(coord)]
    return entry ? { ...entry } : null
  }

  // Ownership is set unconditionally; legality is the engine's job
  claim(coord: Coord, owner: PlayerId, round: number): ClaimChange {
    const index = this.indexOf(coord)
    const current = this.cells[index]

    if (current && current.owner === owner) {
      return { changed: false, previousOwner: owner }
    }

    this.cells[index] = { owner, claimedAt: round }
    if (!current) {
      this.claimed++
    }
    return { changed: true, previousOwner: current ? current.owner : null }
  }

  claimedCount(): number {
    return this.claimed
  }

  ownedBy(owner: PlayerId): number {
    return this.cells.filter(cell => cell !== null && cell.owner === owner).length
  }

  snapshot(): (CellEntry | null)[][] {
    const rows: (CellEntry | null)[][] = []
    for (let y = 0; y < this.height; y++) {
      const row: (CellEntry | null)[] = []
      for (let x = 0; x < this.width; x++) {
        const entry = this.cells[coordToIndex({ x, y }, this.width)]
        row.push(entry ? { ...entry } : null)
      }
      rows.push(row)
    }
    return rows
  }

  private indexOf(coord: Coord): number {
    if (!this.contains(coord)) {
      throw new GameError('out_of_bounds', `(${coord.x}, ${coord.y}) is outside a ${this.width}x${this.height} board`)
    }
    return coordToIndex(coord, this.width)
  }
}
