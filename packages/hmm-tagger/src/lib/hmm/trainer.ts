import { z } from 'zod';
import type { TaggedCorpus } from '../corpus.js';
import { ConfigurationError, NumericalError } from '../errors.js';
import { createLogger } from '../logs.js';
import type { HiddenMarkovModel } from './model.js';

const logger = createLogger('em-trainer');

/** Evaluates a model, typically on held-out data; lower is better. */
export type LossFunction = (model: HiddenMarkovModel) => number;

export type TrainerState = 'initializing' | 'accumulating' | 'reestimating' | 'evaluating' | 'converged' | 'failed';

export const trainOptionsSchema = z.object({
  /** add-λ smoothing for the M step */
  lambda: z.number().min(0).default(0),
  /** stop when the relative improvement of the loss falls below this */
  tolerance: z.number().min(0).default(0.001),
  /** cap on the number of M steps */
  maxSteps: z.number().int().min(0).default(50000),
  /** save the model here once training ends */
  savePath: z.string().min(1).optional()
});

export interface EpochReport {
  step: number;
  /** Total log probability of the training corpus under the parameters of the E step. */
  logLikelihood: number;
  loss: number;
  bestLoss: number;
}

export type TrainOptions = z.input<typeof trainOptionsSchema> & {
  onEpoch?: (report: EpochReport) => void;
};

export interface TrainResult {
  state: TrainerState;
  /** Number of M steps performed. */
  steps: number;
  initialLoss: number;
  bestLoss: number;
  finalLoss: number;
  history: EpochReport[];
}

// M step smoothing used when λ = 0, so that rows with no counts stay defined.
const MIN_LAMBDA = 1e-20;

function parseOptions(opts: TrainOptions | undefined): z.infer<typeof trainOptionsSchema> {
  const parsed = trainOptionsSchema.safeParse(opts ?? {});
  if (!parsed.success) {
    const issues = parsed.error.issues.map(i => `${i.path.join('.')}: ${i.message}`);
    throw new ConfigurationError(`invalid training options: ${issues.join('; ')}`, issues);
  }
  return parsed.data;
}

/**
 * Expectation-Maximization over a corpus. Each step zeroes the expected
 * counts, accumulates them over every sentence, re-estimates A and B only
 * after the whole corpus has contributed, and evaluates the loss.
 */
export class EmTrainer {
  private current: TrainerState = 'initializing';

  constructor(
    private readonly model: HiddenMarkovModel,
    private readonly corpus: TaggedCorpus,
    private readonly loss: LossFunction,
    private readonly opts?: TrainOptions
  ) {}

  get state(): TrainerState {
    return this.current;
  }

  private enter(state: TrainerState): void {
    logger.debug({ from: this.current, to: state }, 'trainer state');
    this.current = state;
  }

  private evaluate(): number {
    const loss = this.loss(this.model);
    if (Number.isNaN(loss)) throw new NumericalError('loss function returned NaN', loss);
    return loss;
  }

  run(): TrainResult {
    try {
      return this.train();
    } catch (err) {
      this.enter('failed');
      throw err;
    }
  }

  private train(): TrainResult {
    const options = parseOptions(this.opts);
    const lambda = options.lambda === 0 ? MIN_LAMBDA : options.lambda;
    const { model, corpus } = this;
    model.assertCompatible(corpus);

    const initialLoss = this.evaluate();
    let bestLoss = initialLoss;
    let finalLoss = initialLoss;
    let steps = 0;
    const history: EpochReport[] = [];

    logger.info({ sentences: corpus.length, lambda: options.lambda, tolerance: options.tolerance, maxSteps: options.maxSteps, initialLoss }, 'starting EM');

    while (steps < options.maxSteps) {
      this.enter('accumulating');
      const counts = model.params.zeroCounts();
      let logLikelihood = 0;
      for (const sentence of corpus) {
        logLikelihood += model.eStep(model.integerize(sentence, corpus), counts);
      }

      this.enter('reestimating');
      model.params.reestimate(counts, lambda);
      steps++;
      if (logger.isLevelEnabled('debug')) logger.debug(model.params.format(model.tagset, model.vocab));

      this.enter('evaluating');
      const loss = this.evaluate();
      finalLoss = loss;
      const improved = loss < bestLoss;
      // any finite loss is an unbounded improvement on an infinite one
      const improvement = !improved ? 0 : bestLoss === Infinity ? Infinity : (bestLoss - loss) / Math.abs(bestLoss);
      if (improved) bestLoss = loss;

      const report: EpochReport = { step: steps, logLikelihood, loss, bestLoss };
      history.push(report);
      this.opts?.onEpoch?.(report);
      logger.info({ ...report, improvement }, 'epoch complete');

      if (!improved || improvement < options.tolerance) break;
    }

    this.enter('converged');
    if (options.savePath) model.save(options.savePath);

    return { state: this.current, steps, initialLoss, bestLoss, finalLoss, history };
  }
}

export function trainModel(model: HiddenMarkovModel, corpus: TaggedCorpus, loss: LossFunction, opts?: TrainOptions): TrainResult {
  return new EmTrainer(model, corpus, loss, opts).run();
}
