export interface User {
  id: string;
  username: string;
  email: string;
  displayName: string;
  rating: number;
  createdAt: Date;
  updatedAt: Date;
}

export interface RatingChange {
  playerId: string;
  oldRating: number;
  newRating: number;
  change: number;
}

export const RATING_CONSTANTS = {
  K_FACTOR: 32, // For Elo rating calculation
} as const;
