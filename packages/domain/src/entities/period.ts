/** Half-open window of instants: start is inclusive, end is exclusive. */
export interface Period {
  readonly start: Date;
  readonly end: Date;
}

export type EntityKind = 'driver' | 'vehicle';
