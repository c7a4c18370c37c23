import React, { useCallback, useEffect, useMemo, useRef, useState } from "react";

// =====================
// Grid Pathfinding Visualizer
// - Paint a start, an end and walls on the grid, pick BFS, DFS or A*
// - One search round per animation step, only changed cells are repainted
// - The path is revealed cell by cell once the end has been reached
// =====================

import { InvalidInputError } from "./errors/errors";
import { SearchSession } from "./engine/session";
import type { SearchObserver, SearchStats } from "./interfaces/interfaces";
import { Grid } from "./model/Grid";
import type { Cell } from "./model/Cell";
import type { AlgoKey, MapType, SearchOutcome } from "./types/types";
import { ALGO_KEYS, MAP_TYPES, grid_defaults, speed_limits } from "./utils/constants";
import { drawCells, drawGrid } from "./utils/drawpanel/drawpanel";
import {
  generateEmpty,
  generateMaze,
  generateRandom,
  pickOpenEnds,
} from "./utils/mapGen/mapGen";
import { cellAtPoint, clamp } from "./utils/utils";

type RunStatus = "Idle" | "Running" | "Paused" | SearchOutcome;

const STATUS_LABEL: Record<RunStatus, string> = {
  Idle: "Idle",
  Running: "Running",
  Paused: "Paused",
  Found: "Found",
  NotFound: "No path",
  Cancelled: "Stopped",
};

const cellPxFor = (rows: number, cols: number) =>
  clamp(Math.floor(720 / Math.max(rows, cols)), 4, grid_defaults.cellPx);

const clampSize = (v: number) =>
  clamp(Math.floor(v) || grid_defaults.minSize, grid_defaults.minSize, grid_defaults.maxSize);

// ---------- Main Component ----------
export default function PathfindingVisualizer() {
  // UI State
  // raw field text, applied to the grid on blur or Enter
  const [rowsText, setRowsText] = useState(String(grid_defaults.rows));
  const [colsText, setColsText] = useState(String(grid_defaults.cols));
  const [algo, setAlgo] = useState<AlgoKey>("BFS");
  const [speed, setSpeed] = useState(speed_limits.initial); // rounds per second
  const [mapType, setMapType] = useState<MapType>("Empty");
  const [density, setDensity] = useState(grid_defaults.density);
  const [seed, setSeed] = useState(grid_defaults.seed);

  const [grid, setGrid] = useState(() => new Grid(grid_defaults.rows, grid_defaults.cols));
  const [running, setRunning] = useState(false);
  const [status, setStatus] = useState<RunStatus>("Idle");
  const [stats, setStats] = useState<SearchStats | null>(null);
  const [pathLength, setPathLength] = useState<number | null>(null);
  const [message, setMessage] = useState<string | null>(null);
  // grid is mutated in place, bump to re-render the start/end readout
  const [, setVersion] = useState(0);
  const bump = () => setVersion((v) => v + 1);

  const canvasRef = useRef<HTMLCanvasElement>(null);
  const sessionRef = useRef<SearchSession | null>(null);
  const revealRef = useRef<Cell[]>([]);
  const paintingRef = useRef(false);

  const cellPx = cellPxFor(grid.rows, grid.cols);

  const context = useCallback(
    () => canvasRef.current?.getContext("2d") ?? null,
    []
  );

  const repaintDirty = useCallback(() => {
    const dirty = grid.takeDirty();
    const ctx = context();
    if (ctx) drawCells(ctx, dirty, cellPx);
  }, [grid, cellPx, context]);

  // The canvas side of the step protocol
  const observer = useMemo<SearchObserver>(
    () => ({
      onStep: () => {
        repaintDirty();
      },
      onSuccess: (path) => {
        // path cells were tagged already; hold them back and reveal one per step
        const onPath = new Set(path.map((cell) => cell.id));
        const dirty = grid.takeDirty().filter((cell) => !onPath.has(cell.id));
        const ctx = context();
        if (ctx) drawCells(ctx, dirty, cellPx);
        revealRef.current = [...path].reverse();
        setPathLength(path.length);
      },
    }),
    [grid, cellPx, context, repaintDirty]
  );

  // One animation step; false once there is nothing left to show
  const advance = useCallback((): boolean => {
    const session = sessionRef.current;
    if (!session) return false;
    if (!session.done) {
      const step = session.step();
      setStats(session.stats);
      if (step) {
        if (observer.onStep(step) === false) session.cancel();
        return !session.done;
      }
      if (session.outcome === "Found") {
        observer.onSuccess(session.path, session.parents);
      } else {
        repaintDirty();
      }
      setStatus(session.outcome ?? "Cancelled");
      return revealRef.current.length > 0;
    }
    const next = revealRef.current.shift();
    const ctx = context();
    if (next && ctx) drawCells(ctx, [next], cellPx);
    return revealRef.current.length > 0;
  }, [observer, repaintDirty, context, cellPx]);

  // Full repaint whenever the grid object or its scale changes
  useEffect(() => {
    const ctx = context();
    grid.takeDirty();
    if (ctx) drawGrid(ctx, grid, cellPx);
  }, [grid, cellPx, context]);

  // Animation loop
  useEffect(() => {
    if (!running) return;
    let handle: number;
    let acc = 0;
    const stepInterval = 1000 / speed;
    let last = performance.now();

    const tick = () => {
      const now = performance.now();
      acc += now - last;
      last = now;

      while (acc >= stepInterval) {
        acc -= stepInterval;
        if (!advance()) {
          setRunning(false);
          return;
        }
      }

      handle = requestAnimationFrame(tick);
    };

    handle = requestAnimationFrame(tick);
    return () => cancelAnimationFrame(handle);
  }, [running, speed, advance]);

  // Drop a live session on unmount or when the grid is replaced
  useEffect(() => () => sessionRef.current?.cancel(), [grid]);

  const run = useCallback(() => {
    const current = sessionRef.current;
    if (current && (!current.done || revealRef.current.length > 0)) {
      if (!current.done) setStatus("Running");
      setRunning(true);
      return;
    }
    let session: SearchSession;
    try {
      session = new SearchSession(algo, grid, grid.start, grid.end);
    } catch (err) {
      if (err instanceof InvalidInputError) {
        setMessage(err.message);
        return;
      }
      throw err;
    }
    grid.clearSearch();
    repaintDirty();
    revealRef.current = [];
    sessionRef.current = session;
    setMessage(null);
    setStats(null);
    setPathLength(null);
    setStatus("Running");
    setRunning(true);
  }, [algo, grid, repaintDirty]);

  const pause = () => {
    if (!running) return;
    setRunning(false);
    if (sessionRef.current && !sessionRef.current.done) setStatus("Paused");
  };

  const stop = () => {
    const session = sessionRef.current;
    setRunning(false);
    // finish the path reveal at once
    const pending = revealRef.current;
    revealRef.current = [];
    const ctx = context();
    if (ctx && pending.length) drawCells(ctx, pending, cellPx);
    if (session && !session.done) {
      session.cancel();
      setStatus("Cancelled");
    }
  };

  const settle = () => {
    stop();
    sessionRef.current = null;
    setStats(null);
    setPathLength(null);
    setStatus("Idle");
  };

  const clearPath = () => {
    settle();
    grid.clearSearch();
    repaintDirty();
  };

  const clearGrid = useCallback(() => {
    sessionRef.current?.cancel();
    sessionRef.current = null;
    revealRef.current = [];
    setRunning(false);
    setStats(null);
    setPathLength(null);
    setStatus("Idle");
    setMessage(null);
    grid.clear();
    repaintDirty();
    bump();
  }, [grid, repaintDirty]);

  const commitSize = () => {
    const nextRows = clampSize(Number(rowsText));
    const nextCols = clampSize(Number(colsText));
    setRowsText(String(nextRows));
    setColsText(String(nextCols));
    if (nextRows === grid.rows && nextCols === grid.cols) return;
    settle();
    setGrid(new Grid(nextRows, nextCols));
    setMessage(null);
  };

  const commitOnEnter = (e: React.KeyboardEvent<HTMLInputElement>) => {
    if (e.key === "Enter") commitSize();
  };

  const applyMap = () => {
    settle();
    grid.clearSearch();
    if (mapType === "Maze") {
      const blocks = generateMaze(grid.rows, grid.cols, seed);
      grid.clear();
      grid.loadObstacles(blocks);
      const ends = pickOpenEnds(blocks);
      if (ends) {
        grid.markStart(grid.cellById(ends.start));
        grid.markEnd(grid.cellById(ends.end));
      }
    } else if (mapType === "Random") {
      grid.loadObstacles(generateRandom(grid.rows, grid.cols, density, seed));
    } else {
      grid.loadObstacles(generateEmpty(grid.rows, grid.cols));
    }
    repaintDirty();
    bump();
  };

  // First click places the start, the second the end, the rest are walls
  const editAt = (clientX: number, clientY: number, erase: boolean, dragging: boolean) => {
    const cvs = canvasRef.current;
    if (!cvs || running) return;
    const sessionLive = sessionRef.current !== null && !sessionRef.current.done;
    if (sessionLive) return;
    const rect = cvs.getBoundingClientRect();
    const pos = cellAtPoint(clientX - rect.left, clientY - rect.top, cellPx, grid.rows, grid.cols);
    if (!pos) return;
    const cell = grid.at(pos.r, pos.c);

    if (sessionRef.current) {
      // editing after a finished run starts from a clean layout
      settle();
      grid.clearSearch();
    }

    if (erase) {
      grid.resetCell(cell);
    } else if (!grid.start) {
      if (dragging) return;
      grid.markStart(cell);
    } else if (!grid.end) {
      if (dragging || cell === grid.start) return;
      grid.markEnd(cell);
    } else if (cell !== grid.start && cell !== grid.end) {
      grid.markObstacle(cell);
    }
    setMessage(null);
    repaintDirty();
    bump();
  };

  const onMouseDown = (e: React.MouseEvent<HTMLCanvasElement>) => {
    paintingRef.current = true;
    editAt(e.clientX, e.clientY, e.button === 2, false);
  };

  const onMouseMove = (e: React.MouseEvent<HTMLCanvasElement>) => {
    if (!paintingRef.current) return;
    editAt(e.clientX, e.clientY, (e.buttons & 2) !== 0, true);
  };

  const endPaint = () => {
    paintingRef.current = false;
  };

  // Space runs, "c" clears
  useEffect(() => {
    const onKey = (e: KeyboardEvent) => {
      const target = e.target;
      if (target instanceof HTMLInputElement || target instanceof HTMLSelectElement) return;
      if (e.key === " ") {
        e.preventDefault();
        run();
      } else if (e.key === "c" || e.key === "C") {
        clearGrid();
      }
    };
    window.addEventListener("keydown", onKey);
    return () => window.removeEventListener("keydown", onKey);
  }, [run, clearGrid]);

  const coord = (cell: Cell | null) => (cell ? `(${cell.r},${cell.c})` : "—");

  return (
    <div className="min-h-screen">
      <div className="wrapper">
        <header className="mb-6">
          <h1 className="text-3xl font-bold tracking-tight">Pathfinding Visualizer</h1>
          <p className="text-slate-600">Breadth-first · Depth-first · A* on a grid you draw</p>
        </header>

        {/* Controls */}
        <div className="controls">
          <div className="control-card">
            <label className="block text-sm mb-1" htmlFor="rows">Rows</label>
            <input id="rows" type="number" value={rowsText} min={grid_defaults.minSize} max={grid_defaults.maxSize} onChange={e=>setRowsText(e.target.value)} onBlur={commitSize} onKeyDown={commitOnEnter} className="w-full border rounded px-3 py-2" />
            <label className="block text-sm mt-3 mb-1" htmlFor="cols">Columns</label>
            <input id="cols" type="number" value={colsText} min={grid_defaults.minSize} max={grid_defaults.maxSize} onChange={e=>setColsText(e.target.value)} onBlur={commitSize} onKeyDown={commitOnEnter} className="w-full border rounded px-3 py-2" />
          </div>
          <div className="control-card">
            <label className="block text-sm mb-1" htmlFor="algo">Algorithm</label>
            <select id="algo" value={algo} disabled={running} onChange={e=>setAlgo(ALGO_KEYS.find(k => k === e.target.value) ?? "BFS")} className="w-full border rounded px-3 py-2">
              {ALGO_KEYS.map(k => <option key={k} value={k}>{k}</option>)}
            </select>
            <label className="block text-sm mt-4" htmlFor="speed">Speed: {speed} steps/s</label>
            <input id="speed" type="range" min={speed_limits.min} max={speed_limits.max} value={speed} onChange={e=>setSpeed(Number(e.target.value))} className="w-full" />
          </div>
          <div className="control-card">
            <label className="block text-sm mb-1" htmlFor="mapType">Map</label>
            <select id="mapType" value={mapType} onChange={e=>setMapType(MAP_TYPES.find(m => m === e.target.value) ?? "Empty")} className="w-full border rounded px-3 py-2">
              {MAP_TYPES.map(m => <option key={m}>{m}</option>)}
            </select>
            {mapType === "Random" && (
              <div className="mt-3">
                <label className="block text-sm" htmlFor="density">Obstacle Density: {(density*100).toFixed(0)}%</label>
                <input id="density" type="range" min={0} max={0.5} step={0.01} value={density} onChange={e=>setDensity(Number(e.target.value))} className="w-full" />
              </div>
            )}
            <label className="block text-sm mt-3 mb-1" htmlFor="seed">Seed</label>
            <input id="seed" type="number" value={seed} onChange={e=>setSeed(Number(e.target.value)||0)} className="w-full border rounded px-3 py-2" />
            <button onClick={applyMap} disabled={running} className="mt-3 px-4 py-2 rounded-xl bg-slate-600 text-white disabled:opacity-50">Apply map</button>
          </div>
          <div className="bg-white rounded-2xl shadow p-4 flex flex-col gap-2">
            <button onClick={run} disabled={running} className="px-4 py-2 rounded-xl bg-emerald-600 text-white disabled:opacity-50">Run</button>
            <button onClick={pause} className="px-4 py-2 rounded-xl bg-amber-500 text-white">Pause</button>
            <button onClick={stop} className="px-4 py-2 rounded-xl bg-rose-600 text-white">Stop</button>
            <button onClick={clearPath} className="px-4 py-2 rounded-xl bg-slate-500 text-white">Clear path</button>
            <button onClick={clearGrid} className="px-4 py-2 rounded-xl bg-slate-800 text-white">Clear grid</button>
            <div className="text-xs text-slate-500" data-testid="endpoints">Start: {coord(grid.start)} · End: {coord(grid.end)}</div>
          </div>
        </div>

        {message && <div role="alert" className="alert">{message}</div>}

        {/* Board */}
        <div className="panel">
          <div className="flex items-center justify-between mb-2">
            <h2 className="font-semibold">{algo}</h2>
            <div className="text-xs text-slate-500" data-testid="status">{STATUS_LABEL[status]}</div>
          </div>
          <canvas
            ref={canvasRef}
            width={grid.cols * cellPx}
            height={grid.rows * cellPx}
            onMouseDown={onMouseDown}
            onMouseMove={onMouseMove}
            onMouseUp={endPaint}
            onMouseLeave={endPaint}
            onContextMenu={e=>e.preventDefault()}
          />
          <div className="stats">
            <div className="text-slate-500">Rounds</div><div className="font-mono">{stats?.rounds ?? 0}</div>
            <div className="text-slate-500">Expanded</div><div className="font-mono">{stats?.nodesExpanded ?? 0}</div>
            <div className="text-slate-500">Peak frontier</div><div className="font-mono">{stats?.peakFrontier ?? 0}</div>
            <div className="text-slate-500">Runtime</div><div className="font-mono">{stats ? stats.runtimeMs.toFixed(1)+" ms" : "0.0 ms"}</div>
            <div className="text-slate-500">Path length</div><div className="font-mono">{pathLength ?? "—"}</div>
          </div>
        </div>

        <footer className="mt-8 text-xs text-slate-500">
          Tips: left click places the start, then the end, then walls (drag to paint); right click erases. Space runs, C clears. Colors — walls: slate‑900, frontier: blue‑200, visited: amber‑200, path: pink‑300, start: green, end: violet.
        </footer>
      </div>
    </div>
  );
}
