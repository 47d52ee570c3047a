/**
 * Branded primitives shared by the Effect services.
 */
import { Schema } from "effect"

// =============================================================================
// Terminal dimensions
// =============================================================================

/** Terminal width in cells */
export const Cols = Schema.Int.pipe(Schema.positive(), Schema.brand("Cols"))
export type Cols = typeof Cols.Type

/** Terminal height in cells */
export const Rows = Schema.Int.pipe(Schema.positive(), Schema.brand("Rows"))
export type Rows = typeof Rows.Type

// =============================================================================
// Identifiers
// =============================================================================

/** Process pane identifier */
export const PaneId = Schema.String.pipe(Schema.brand("PaneId"))
export type PaneId = typeof PaneId.Type

let paneCounter = 0

export const makePaneId = (): PaneId => PaneId.make(`pane-${++paneCounter}`)
