// ============================================================
// Shape Scatter - Session Driver
// Owns the context of one run (catalogue, registry, random
// source, clock) and keeps placing shapes until the deadline.
// ============================================================

import { DEFAULT_CONFIG } from '@shared/types';
import type {
  Bounds,
  Catalogue,
  Outline,
  Placement,
  PlacementOutcome,
  RunParameters,
  ScatterConfig,
  SessionResult,
} from '@shared/types';
import { canvasBounds, tryPlace, type Clock } from './placement';
import { createRandom, pick, type RandomSource } from './random';
import { SceneRegistry } from './registry';

export interface SessionOptions {
  catalogue: Catalogue;
  parameters: Pick<RunParameters, 'scale' | 'seed' | 'duration'>;
  config?: Partial<ScatterConfig>;
  clock?: Clock;
  /** Overrides the generator seeded from `parameters.seed` */
  random?: RandomSource;
  /** Called once per committed placement, after the registry append */
  onPlaced?: (placement: Placement) => void;
  /** Called once per rejected search */
  onRejected?: (shape: string, outcome: Extract<PlacementOutcome, { status: 'rejected' }>) => void;
}

export class ScatterSession {
  readonly registry = new SceneRegistry();
  readonly config: ScatterConfig;
  readonly bounds: Bounds;
  readonly startedAt: number;
  readonly deadline: number;

  private readonly templates: Array<[string, Outline]>;
  private readonly scale: number;
  private readonly clock: Clock;
  private readonly random: RandomSource;
  private readonly onPlaced?: (placement: Placement) => void;
  private readonly onRejected?: SessionOptions['onRejected'];

  private attempts = 0;
  private rejections = 0;

  constructor(options: SessionOptions) {
    if (options.catalogue.size === 0) {
      throw new Error('Cannot start a session with an empty catalogue');
    }

    this.config = { ...DEFAULT_CONFIG, ...options.config };
    this.templates = [...options.catalogue.entries()];
    this.scale = options.parameters.scale;
    this.clock = options.clock ?? Date.now;
    this.random = options.random ?? createRandom(options.parameters.seed);
    this.onPlaced = options.onPlaced;
    this.onRejected = options.onRejected;

    this.bounds = canvasBounds(this.config.surface, this.config.span);
    this.startedAt = this.clock();
    this.deadline = this.startedAt + options.parameters.duration * 1000;
  }

  /** True once the session clock has reached its deadline. */
  get done(): boolean {
    return this.clock() >= this.deadline;
  }

  /**
   * Picks a random template and color and searches for a position. A
   * rejected search is logged and leaves the registry untouched.
   */
  placeNext(): PlacementOutcome {
    const [shape, outline] = pick(this.random, this.templates);
    const color = pick(this.random, this.config.colors);

    const outcome = tryPlace(
      { shape, outline, color, scale: this.scale, bounds: this.bounds },
      {
        registry: this.registry,
        deadline: this.deadline,
        clock: this.clock,
        random: this.random,
        buffer: this.config.buffer,
        maxAttempts: this.config.maxAttempts,
        margin: this.config.margin,
      },
    );
    this.attempts += outcome.attempts;

    if (outcome.status === 'placed') {
      this.registry.add(outcome.placement);
      this.onPlaced?.(outcome.placement);
    } else {
      this.rejections++;
      console.warn(
        `[session] Could not place shape "${shape}": ${outcome.reason} after ${outcome.attempts} attempts`,
      );
      this.onRejected?.(shape, outcome);
    }

    return outcome;
  }

  /** Places shapes until the deadline. */
  run(): SessionResult {
    while (!this.done) {
      this.placeNext();
    }
    return this.result();
  }

  /** Snapshot of the run so far; later placements do not show up in it. */
  result(): SessionResult {
    return {
      startedAt: this.startedAt,
      endedAt: this.clock(),
      placements: [...this.registry.all()],
      attempts: this.attempts,
      rejections: this.rejections,
    };
  }
}
