import { Position } from './position.entity';

// Named collection of positions owned by one user.
// Name is unique per owner.
export interface Holding {
  id: string;
  ownerId: string;
  name: string;
  description?: string;
  createdAt: Date;
  updatedAt: Date;
}

// Fetch shape with positions eagerly loaded.
export interface HoldingWithPositions extends Holding {
  positions: Position[];
}
