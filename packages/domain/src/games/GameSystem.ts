export type GameSystem = Readonly<{
  id: number;
  code: string;
  displayName: string;
}>;

export type SystemFrameRate = Readonly<{
  id: number;
  systemId: number;
  frameRate: number;
  regionCode: string;
}>;

export type Game = Readonly<{
  id: number;
  displayName: string;
}>;

export type GameVersion = Readonly<{
  id: number;
  gameId: number;
  name: string;
}>;

export type GameGoal = Readonly<{
  id: number;
  gameId: number;
  displayName: string;
}>;

export type PublicationClass = Readonly<{
  id: number;
  name: string;
  iconPath: string | null;
}>;
