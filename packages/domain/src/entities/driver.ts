export interface Driver {
  readonly id: string;
  readonly name: string;
  readonly surname: string;
  readonly notes: string | null;
  readonly isActive: boolean;
}
