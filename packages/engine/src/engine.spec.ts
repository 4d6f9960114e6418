import { strict as assert } from "assert";
import bunyan from "bunyan";
import { ISearchEngine, Rng, SeededRng } from "@ttt-mcts/core";
import { DatasetFormatError, DatasetRecorder, parseDatasetDocument } from "./DatasetRecorder";
import { MoveEvent, SelfPlayDriver } from "./SelfPlayDriver";
import { ISelfPlayGame } from "./interfaces/ISelfPlayGame";

// Inline a minimal "fill the row" game for testing (avoids circular workspace dep):
// two players alternately mark one of four cells; the owner of cell 0 wins.
type Mark = "A" | "B" | "";

interface RowState {
  cells: Mark[];
  turn: "A" | "B";
  random: boolean;
}

const CODES: Record<Mark, string> = { A: "1", B: "-1", "": "0" };

function applyRowMove(state: RowState, index: number, random = false): RowState {
  if (state.cells[index] !== "") throw new Error(`cell ${index} taken`);
  const cells = [...state.cells];
  cells[index] = state.turn;
  return { cells, turn: state.turn === "A" ? "B" : "A", random };
}

function emptyCells(state: RowState): number[] {
  return state.cells.flatMap((c, i) => (c === "" ? [i] : []));
}

const FillRow: ISelfPlayGame<RowState> = {
  gameId: "fillrow",
  name: "Fill Row",
  ui: {
    playerLabels: ["A", "B"],
    inputHint: "Enter 0-3",
    maxTurns: 4,
    renderBoard: (s) => s.cells.map((c) => c || ".").join(""),
    renderStatus: (s) => (s.cells.every((c) => c !== "") ? `${s.cells[0]} wins` : null),
    parseInput: (raw) => (/^[0-3]$/.test(raw) ? Number(raw) : null),
    formatMove: (i) => `cell ${i}`,
  },
  init: () => ({ cells: ["", "", "", ""], turn: "A", random: false }),
  applyMove: (s, i) => applyRowMove(s, i),
  stateKey: (s) => `${s.cells.map((c) => c || ".").join("")}:${s.turn}`,
  enumerateMoves: (s) =>
    s.cells.every((c) => c !== "") ? [] : emptyCells(s).map((i) => applyRowMove(s, i)),
  randomMove(s: RowState, rng: Rng) {
    const empty = emptyCells(s);
    if (empty.length === 0) return null;
    return applyRowMove(s, empty[rng.nextInt(empty.length)], true);
  },
  isTerminal: (s) => s.cells.every((c) => c !== ""),
  reward: () => 0,
  isRandomTransition: (s) => s.random,
  toTrainingRecord(prev, next) {
    const action = prev.cells.findIndex((c, i) => c !== next.cells[i]);
    return { state: prev.cells.map((c) => CODES[c]), turn: CODES[prev.turn], action };
  },
  validateRecord: () => null,
  getOutcome(s) {
    const winner = s.cells[0];
    if (winner === "" || s.cells.some((c) => c === "")) {
      return { winner: null, draw: false, reason: "game_in_progress" };
    }
    return { winner, draw: false, reason: "owns_first_cell" };
  },
};

/** Always plays the lowest free cell and remembers what it was asked. */
class LowestCellEngine implements ISearchEngine<RowState> {
  simulationCounts: number[] = [];
  selectCalls = 0;

  runSimulations(_state: RowState, count: number): void {
    this.simulationCounts.push(count);
  }

  selectMove(state: RowState): RowState {
    this.selectCalls++;
    return FillRow.enumerateMoves(state)[0];
  }
}

/** Like LowestCellEngine, but every other choice is tagged as a random fallback. */
class FallbackEngine extends LowestCellEngine {
  selectMove(state: RowState): RowState {
    const chosen = super.selectMove(state);
    return this.selectCalls % 2 === 1 ? { ...chosen, random: true } : chosen;
  }
}

describe("DatasetRecorder", () => {
  const first = { state: ["0", "0", "0", "0"], turn: "1", action: 2 };
  const second = { state: ["0", "0", "1", "0"], turn: "-1", action: 0 };

  it("should append records in lockstep", () => {
    const recorder = new DatasetRecorder();
    recorder.record(first);
    recorder.record(second);

    assert.equal(recorder.size, 2);
    assert.deepEqual(recorder.toDocument(), {
      State: [first.state, second.state],
      Turn: ["1", "-1"],
      Action: [2, 0],
    });
    assert.deepEqual(recorder.getRecord(1), second);
    assert.equal(recorder.getRecord(2), undefined);
    assert.equal(recorder.getRecord(-1), undefined);
  });

  it("should not be affected by later mutation of a recorded snapshot", () => {
    const recorder = new DatasetRecorder();
    const state = ["0", "0", "0", "0"];
    recorder.record({ state, turn: "1", action: 1 });
    state[0] = "1";
    assert.deepEqual(recorder.toDocument().State[0], ["0", "0", "0", "0"]);
  });

  it("should serialize with 2-space indentation and a trailing newline", () => {
    const recorder = new DatasetRecorder();
    recorder.record({ state: ["0", "-1"], turn: "1", action: 0 });
    assert.equal(
      recorder.serialize(),
      [
        "{",
        '  "State": [',
        "    [",
        '      "0",',
        '      "-1"',
        "    ]",
        "  ],",
        '  "Turn": [',
        '    "1"',
        "  ],",
        '  "Action": [',
        "    0",
        "  ]",
        "}",
        "",
      ].join("\n")
    );
  });

  it("should serialize an empty batch as three empty arrays", () => {
    assert.deepEqual(JSON.parse(new DatasetRecorder().serialize()), {
      State: [],
      Turn: [],
      Action: [],
    });
  });

  it("should give equal digests to equal content", () => {
    const a = new DatasetRecorder();
    const b = new DatasetRecorder();
    a.record(first);
    b.record(first);
    assert.equal(a.digest(), b.digest());
    b.record(second);
    assert.notEqual(a.digest(), b.digest());
  });

  it("should rebuild from a parsed document", () => {
    const recorder = new DatasetRecorder();
    recorder.record(first);
    recorder.record(second);

    const parsed = parseDatasetDocument(JSON.parse(recorder.serialize()));
    const rebuilt = DatasetRecorder.fromDocument(parsed);
    assert.equal(rebuilt.size, 2);
    assert.equal(rebuilt.digest(), recorder.digest());
  });
});

describe("parseDatasetDocument", () => {
  it("should reject non-objects", () => {
    assert.throws(() => parseDatasetDocument([]), DatasetFormatError);
    assert.throws(() => parseDatasetDocument(null), /must be a JSON object/);
  });

  it("should reject missing arrays", () => {
    assert.throws(() => parseDatasetDocument({ State: [], Turn: [] }), /Missing "Action" array/);
  });

  it("should reject arrays of different length", () => {
    assert.throws(
      () => parseDatasetDocument({ State: [["0"]], Turn: [], Action: [] }),
      /State=1 Turn=0 Action=0/
    );
  });

  it("should reject badly typed entries", () => {
    assert.throws(
      () => parseDatasetDocument({ State: [[0]], Turn: ["1"], Action: [0] }),
      /State\[0\] must be an array of strings/
    );
    assert.throws(
      () => parseDatasetDocument({ State: [["0"]], Turn: [1], Action: [0] }),
      /Turn\[0\] must be a string/
    );
    assert.throws(
      () => parseDatasetDocument({ State: [["0"]], Turn: ["1"], Action: [1.5] }),
      /Action\[0\] must be an integer/
    );
  });
});

describe("SelfPlayDriver", () => {
  it("should play a game to the end and record every search-chosen move", () => {
    const engine = new LowestCellEngine();
    const driver = new SelfPlayDriver({
      game: FillRow,
      createEngine: () => engine,
      simulations: 7,
      rng: new SeededRng("test-seed"),
    });

    const summary = driver.playGame(0);
    assert.equal(summary.moves, 4);
    assert.equal(summary.recorded, 4);
    assert.equal(summary.outcome.winner, "A");
    assert.deepEqual(engine.simulationCounts, [7, 7, 7, 7]);

    assert.deepEqual(driver.getRecorder().toDocument(), {
      State: [
        ["0", "0", "0", "0"],
        ["1", "0", "0", "0"],
        ["1", "-1", "0", "0"],
        ["1", "-1", "1", "0"],
      ],
      Turn: ["1", "-1", "1", "-1"],
      Action: [0, 1, 2, 3],
    });
  });

  it("should skip transitions the engine reached by a random fallback", () => {
    const driver = new SelfPlayDriver({
      game: FillRow,
      createEngine: () => new FallbackEngine(),
      rng: new SeededRng("test-seed"),
    });

    const summary = driver.playGame(0);
    assert.equal(summary.moves, 4);
    assert.equal(summary.recorded, 2);
    assert.deepEqual(driver.getRecorder().toDocument(), {
      State: [
        ["1", "0", "0", "0"],
        ["1", "-1", "1", "0"],
      ],
      Turn: ["-1", "-1"],
      Action: [1, 3],
    });
  });

  it("should never record moves the driver forced at random", () => {
    const engine = new LowestCellEngine();
    const driver = new SelfPlayDriver({
      game: FillRow,
      createEngine: () => engine,
      randomMoveRate: 1,
      rng: new SeededRng("test-seed"),
    });

    const summary = driver.playGame(0);
    assert.equal(summary.moves, 4);
    assert.equal(summary.recorded, 0);
    assert.equal(engine.selectCalls, 0);
    assert.deepEqual(engine.simulationCounts, []);
    assert.equal(driver.getRecorder().size, 0);
  });

  it("should report each move with the rendered board and status", () => {
    const events: MoveEvent<RowState>[] = [];
    const driver = new SelfPlayDriver({
      game: FillRow,
      createEngine: () => new LowestCellEngine(),
      rng: new SeededRng("test-seed"),
      onMove: (event) => events.push(event),
    });

    driver.playGame(3);
    assert.deepEqual(
      events.map((e) => [e.gameIndex, e.moveNumber, e.board, e.status, e.recorded]),
      [
        [3, 1, "A...", null, true],
        [3, 2, "AB..", null, true],
        [3, 3, "ABA.", null, true],
        [3, 4, "ABAB", "A wins", true],
      ]
    );
  });

  it("should run a batch with a fresh engine per game", () => {
    let enginesCreated = 0;
    const recorder = new DatasetRecorder();
    const driver = new SelfPlayDriver({
      game: FillRow,
      createEngine: () => {
        enginesCreated++;
        return new LowestCellEngine();
      },
      recorder,
      games: 3,
      rng: new SeededRng("test-seed"),
    });

    const result = driver.run();
    assert.equal(enginesCreated, 3);
    assert.equal(result.gamesCompleted, 3);
    assert.deepEqual(result.wins, { A: 3 });
    assert.equal(result.draws, 0);
    assert.equal(result.records, 12);
    assert.equal(result.averageMoves, 4);
    assert.equal(recorder.size, 12);
    assert.equal(driver.getRecorder(), recorder);
  });

  it("should log the run summary through the given bunyan logger", () => {
    const ring = new bunyan.RingBuffer({ limit: 50 });
    const logger = bunyan.createLogger({
      name: "test",
      streams: [{ type: "raw", stream: ring, level: "debug" }],
    });

    const driver = new SelfPlayDriver({
      game: FillRow,
      createEngine: () => new LowestCellEngine(),
      games: 2,
      rng: new SeededRng("test-seed"),
      logger,
    });
    driver.run();

    const messages = ring.records.map((r: { msg: string }) => r.msg);
    assert.deepEqual(messages, [
      "Self-play started",
      "Game finished",
      "Game finished",
      "Self-play finished",
    ]);
    const finished = ring.records[3];
    assert.equal(finished.records, 8);
    assert.equal(finished.component, "selfplay");
    assert.equal(finished.gameId, "fillrow");
  });

  it("should reject invalid options", () => {
    const base = { game: FillRow, createEngine: () => new LowestCellEngine() };
    assert.throws(() => new SelfPlayDriver({ ...base, simulations: 0 }), /simulations/);
    assert.throws(() => new SelfPlayDriver({ ...base, games: -1 }), /games/);
    assert.throws(() => new SelfPlayDriver({ ...base, randomMoveRate: 1.5 }), /randomMoveRate/);
  });
});
