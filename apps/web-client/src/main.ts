import {
  GameSession,
  createMemoryBestScoreGateway,
  createStorageBestScoreGateway,
  isGameError,
  isTargetTile,
  loadSettings,
  toEngineConfig
} from "@tilemerge/game-core";
import type { BestScoreGateway, GameAction, GameEvent, GameSettings, TargetTile, TilePlacement } from "@tilemerge/game-core";
import { Application, Container, Graphics, Text, TextStyle } from "pixi.js";

import settingsContent from "../../../packages/game-data/content/settings.json";
import stringsContent from "../../../packages/game-data/content/strings.en.json";
import themeContent from "../../../packages/game-data/content/theme.json";
import { PendingTarget, mergeHighlights } from "./controls.js";
import { describeAction, feedbackForError, formatEvent, statusText, translate } from "./format.js";
import type { StringsBundle } from "./format.js";
import { ARROW_PAD, commandForKey } from "./input.js";
import { loadTheme, tileColors, tileFontSize } from "./theme.js";

const strings: StringsBundle = stringsContent;

function $(id: string): HTMLElement {
  const el = document.getElementById(id);
  if (!el) throw new Error(`Missing #${id} element`);
  return el;
}

function $as<T extends HTMLElement>(id: string, ctor: { new (): T }): T {
  const el = $(id);
  if (!(el instanceof ctor)) throw new Error(`#${id} is not a ${ctor.name}`);
  return el;
}

function randomSeed(): number {
  return crypto.getRandomValues(new Uint32Array(1))[0] ?? Date.now() >>> 0;
}

function openBestScoreStore(settings: GameSettings, onError: (message: string) => void): BestScoreGateway {
  try {
    return createStorageBestScoreGateway(window.localStorage, {
      key: settings.storageKey,
      onError: (err) => onError(err.message)
    });
  } catch (err) {
    // Accessing localStorage throws when the browser blocks site data.
    onError(`localStorage unavailable (${String(err)}); best score is kept for this session only`);
    return createMemoryBestScoreGateway();
  }
}

async function main() {
  const settings = loadSettings(settingsContent);
  const theme = loadTheme(themeContent);

  const host = $("stage");
  const newGameBtn = $as("newGameBtn", HTMLButtonElement);
  const undoBtn = $as("undoBtn", HTMLButtonElement);
  const resetBestBtn = $as("resetBestBtn", HTMLButtonElement);
  const targetSelect = $as("targetSelect", HTMLSelectElement);
  const statusLine = $("statusLine");
  const toggleLogBtn = $as("toggleLogBtn", HTMLButtonElement);
  const closeLogBtn = $as("closeLogBtn", HTMLButtonElement);
  const logPanel = $as("logPanel", HTMLDivElement);
  const logPanelBody = $as("logPanelBody", HTMLDivElement);
  const arrowButtons = ARROW_PAD.map((pad) => ({ ...pad, button: $as(pad.id, HTMLButtonElement) }));

  document.title = translate(strings, "app.title");

  const timeline: Array<{ kind: "ACTION" | "EVENT" | "WARN"; text: string }> = [];
  function appendLine(kind: "ACTION" | "EVENT" | "WARN", text: string) {
    timeline.push({ kind, text });
    while (timeline.length > 250) timeline.shift();
    logPanelBody.textContent = timeline.map((l) => `${l.kind}: ${l.text}`).join("\n");
    logPanelBody.scrollTop = logPanelBody.scrollHeight;
  }

  function warn(message: string) {
    console.warn(`[tile-merge] ${message}`);
    appendLine("WARN", message);
  }

  const session = new GameSession(openBestScoreStore(settings, warn), toEngineConfig(settings, randomSeed()));

  const app = new Application();
  await app.init({ resizeTo: host, antialias: true, backgroundAlpha: 0 });
  host.appendChild(app.canvas);

  // Layers
  const root = new Container();
  app.stage.addChild(root);

  const hud = new Container();
  root.addChild(hud);
  const labelStyle = new TextStyle({ fill: 0x776e65, fontFamily: "system-ui", fontSize: 16, fontWeight: "bold" });
  const scoreText = new Text({ text: "", style: labelStyle });
  const bestText = new Text({ text: "", style: labelStyle });
  const movesText = new Text({ text: "", style: labelStyle });
  const targetText = new Text({ text: "", style: labelStyle });
  hud.addChild(scoreText, bestText, movesText, targetText);

  const boardLayer = new Container();
  root.addChild(boardLayer);
  const boardBg = new Graphics();
  boardLayer.addChild(boardBg);

  type TileView = { frame: Graphics; label: Text };
  const size = settings.boardSize;
  const tiles: TileView[][] = [];
  for (let r = 0; r < size; r += 1) {
    const row: TileView[] = [];
    for (let c = 0; c < size; c += 1) {
      const frame = new Graphics();
      const label = new Text({ text: "", style: new TextStyle({ fontFamily: "system-ui", fontWeight: "bold", fontSize: 24 }) });
      label.anchor.set(0.5);
      boardLayer.addChild(frame, label);
      row.push({ frame, label });
    }
    tiles.push(row);
  }

  let lastMerges: TilePlacement[] = [];
  const pendingTarget = new PendingTarget();

  // --- Rendering ---
  function renderHud() {
    const snap = session.snapshot();
    scoreText.text = `${translate(strings, "hud.score")}: ${snap.score}`;
    bestText.text = `${translate(strings, "hud.best")}: ${snap.bestScore}`;
    movesText.text = `${translate(strings, "hud.moves")}: ${snap.moveCount}`;
    targetText.text = `${translate(strings, "hud.target")}: ${snap.target}`;

    let x = 0;
    for (const t of [scoreText, bestText, movesText, targetText]) {
      t.position.set(x, 0);
      x += t.width + 24;
    }
    hud.position.set(Math.max(8, Math.floor(app.screen.width / 2 - x / 2)), 8);
  }

  function renderBoard() {
    const snap = session.snapshot();
    const top = 44;
    const side = Math.max(120, Math.min(app.screen.width - 16, app.screen.height - top - 8));
    const gap = Math.max(4, Math.round(side * 0.025));
    const cell = (side - gap * (size + 1)) / size;
    boardLayer.position.set(Math.floor(app.screen.width / 2 - side / 2), top);
    boardBg.clear().roundRect(0, 0, side, side, 10).fill({ color: theme.boardBackground });

    const merged = new Set(lastMerges.map((m) => `${m.row}:${m.col}`));
    snap.board.forEach((cells, r) => {
      cells.forEach((value, c) => {
        const view = tiles[r]?.[c];
        if (!view) return;
        const x = gap + c * (cell + gap);
        const y = gap + r * (cell + gap);
        const colors = value === 0 ? null : tileColors(theme, value);
        view.frame.clear().roundRect(x, y, cell, cell, 6).fill({ color: colors ? colors.bg : theme.emptyCell });
        if (merged.has(`${r}:${c}`)) view.frame.stroke({ width: 3, color: theme.flash });
        view.label.text = value === 0 ? "" : String(value);
        if (colors) {
          view.label.style.fill = colors.fg;
          view.label.style.fontSize = tileFontSize(value, cell);
        }
        view.label.position.set(x + cell / 2, y + cell / 2);
      });
    });
  }

  function renderControls() {
    const snap = session.snapshot();
    undoBtn.disabled = !snap.canUndo;
    for (const a of arrowButtons) a.button.disabled = snap.status !== "Ongoing";
    targetSelect.value = String(pendingTarget.shown(snap.target));
  }

  function renderAll() {
    renderHud();
    renderBoard();
    renderControls();
  }

  function onEvents(events: GameEvent[]) {
    for (const e of events) {
      if (e.type === "PERSISTENCE_UNAVAILABLE") warn(e.message);
      else appendLine("EVENT", formatEvent(e));
    }
    lastMerges = mergeHighlights(events);
  }

  function dispatch(action: GameAction) {
    appendLine("ACTION", describeAction(action));
    try {
      const res = session.dispatch(action);
      onEvents(res.events);
      statusLine.textContent = statusText(session.snapshot(), strings);
    } catch (err) {
      if (!isGameError(err)) throw err;
      lastMerges = mergeHighlights(null);
      appendLine("EVENT", `${err.code}: ${err.message}`);
      const feedback = feedbackForError(err, strings);
      if (feedback) statusLine.textContent = feedback;
    }
    renderAll();
  }

  function selectedTarget(): TargetTile {
    const value = Number(targetSelect.value);
    return isTargetTile(value) ? value : settings.defaultTarget;
  }

  function requestNewGame() {
    if (!window.confirm(translate(strings, "confirm.newGame"))) return;
    dispatch({ type: "NEW_GAME", target: pendingTarget.take(selectedTarget()) });
  }

  // --- Controls ---
  for (const target of settings.targets) {
    const opt = document.createElement("option");
    opt.value = String(target);
    opt.textContent = String(target);
    targetSelect.appendChild(opt);
  }
  targetSelect.onchange = () => {
    const target = selectedTarget();
    const snap = session.snapshot();
    if (snap.status === "Ongoing") {
      pendingTarget.clear();
      dispatch({ type: "SET_TARGET", target });
    } else {
      pendingTarget.choose(target, snap.target);
      appendLine("EVENT", `Target ${target} applies to the next game`);
      renderControls();
    }
  };

  newGameBtn.onclick = requestNewGame;
  undoBtn.onclick = () => dispatch({ type: "UNDO" });
  resetBestBtn.onclick = () => {
    if (window.confirm(translate(strings, "confirm.resetBest"))) dispatch({ type: "RESET_BEST" });
  };
  for (const a of arrowButtons) {
    a.button.textContent = a.label;
    a.button.onclick = () => dispatch({ type: "MOVE", direction: a.direction });
  }

  window.addEventListener("keydown", (ev) => {
    if (ev.target instanceof HTMLSelectElement || ev.target instanceof HTMLInputElement) return;
    const cmd = commandForKey(ev);
    if (!cmd) return;
    ev.preventDefault();
    if (cmd.type === "NEW_GAME") requestNewGame();
    else dispatch(cmd);
  });

  // --- Log UI (optional, not required to play) ---
  toggleLogBtn.onclick = () => {
    logPanel.style.display = logPanel.style.display === "none" || !logPanel.style.display ? "block" : "none";
  };
  closeLogBtn.onclick = () => {
    logPanel.style.display = "none";
  };

  window.addEventListener("beforeunload", () => {
    if (!session.shutdown()) warn("Best score could not be saved on exit");
  });
  app.renderer.on("resize", renderAll);

  // Boot
  appendLine("EVENT", `GAME_STARTED target=${session.snapshot().target}`);
  statusLine.textContent = statusText(session.snapshot(), strings);
  renderAll();
}

main().catch((err: unknown) => {
  console.error(err);
  const statusLine = document.getElementById("statusLine");
  if (statusLine) statusLine.textContent = `Failed to start: ${String(err)}`;
});
