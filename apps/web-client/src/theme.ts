export type TileColors = { bg: number; fg: number };

export type Theme = {
  boardBackground: number;
  emptyCell: number;
  flash: number;
  fallbackTile: TileColors;
  tiles: Map<number, TileColors>;
};

const HEX_COLOR = /^#([0-9a-f]{6})$/i;

function assert(condition: unknown, message: string): asserts condition {
  if (!condition) throw new Error(message);
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

export function parseHexColor(value: unknown, where: string): number {
  assert(typeof value === "string", `loadTheme: ${where} must be a string`);
  const hex = HEX_COLOR.exec(value)?.[1];
  assert(hex !== undefined, `loadTheme: ${where} must look like #rrggbb, got ${value}`);
  return Number.parseInt(hex, 16);
}

function parseTileColors(value: unknown, where: string): TileColors {
  assert(isRecord(value), `loadTheme: ${where} must be an object`);
  return { bg: parseHexColor(value.bg, `${where}.bg`), fg: parseHexColor(value.fg, `${where}.fg`) };
}

export function loadTheme(raw: unknown): Theme {
  assert(isRecord(raw), "loadTheme: theme must be an object");
  assert(isRecord(raw.tiles), "loadTheme: tiles must be an object");

  const tiles = new Map<number, TileColors>();
  for (const [key, value] of Object.entries(raw.tiles)) {
    const n = Number(key);
    assert(Number.isInteger(n) && n >= 2, `loadTheme: tile key ${key} is not a tile value`);
    tiles.set(n, parseTileColors(value, `tiles.${key}`));
  }

  return {
    boardBackground: parseHexColor(raw.boardBackground, "boardBackground"),
    emptyCell: parseHexColor(raw.emptyCell, "emptyCell"),
    flash: parseHexColor(raw.flash, "flash"),
    fallbackTile: parseTileColors(raw.fallbackTile, "fallbackTile"),
    tiles
  };
}

export function tileColors(theme: Theme, value: number): TileColors {
  return theme.tiles.get(value) ?? theme.fallbackTile;
}

export function tileFontSize(value: number, cellSize: number): number {
  const digits = String(value).length;
  const scale = digits <= 2 ? 0.45 : digits === 3 ? 0.38 : digits === 4 ? 0.3 : 0.24;
  return Math.max(10, Math.round(cellSize * scale));
}
