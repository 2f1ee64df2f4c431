import type {
  CircuitTopology,
  FeedSpecification,
  ResolvedIsotherm,
  RunOptions,
  SolverConfig,
  StageProfile,
  StageResult,
} from './sx-types';
import { DEFAULT_SOLVER_CONFIG } from './sx-config';
import { EquilibriumModel, extractionOrganic, strippingOrganic } from './sx-equilibrium';
import { resolveFeed, type ResolvedFeed } from './sx-feed';
import { buildFlowsheet, mixedInletCopper, toCircuitFlows, type Flowsheet } from './sx-flowsheet';
import { brentRoot } from './sx-root-finding';

// Concentration state carried between sweeps (g/L Cu).
interface CircuitState {
  raffinate: number[];   // aqueous leaving each extraction stage
  loaded: number[];      // organic leaving each extraction stage
  stripped: number[];    // organic leaving each stripping stage
  electrolyte: number[]; // aqueous leaving each stripping stage
}

interface RunContext {
  topology: CircuitTopology;
  feed: ResolvedFeed;
  flowsheet: Flowsheet;
  isotherm: ResolvedIsotherm;
  state: CircuitState;
  issues: string[];
}

function flatten(state: CircuitState): number[] {
  return [...state.raffinate, ...state.loaded, ...state.stripped, ...state.electrolyte];
}

function maxRelativeChange(next: number[], previous: number[]): number {
  let worst = 0;
  for (let k = 0; k < next.length; k++) {
    const change = Math.abs(next[k] - previous[k]) / Math.max(Math.abs(previous[k]), 1e-12);
    if (change > worst) worst = change;
  }
  return worst;
}

/**
 * Stage-wise fixed-point solver for a countercurrent extraction/stripping
 * circuit. Each sweep runs forward and backward Gauss-Seidel passes over the
 * extraction train, then over the stripping train, solving every stage's
 * copper balance with its Murphree efficiency by Brent's method. Circuits
 * that bleed rich electrolyte into extraction close each sweep with another
 * extraction pass.
 */
export class CounterCurrentSolver {
  readonly model: EquilibriumModel;
  readonly config: SolverConfig;

  constructor(model: EquilibriumModel = new EquilibriumModel(), config: SolverConfig = DEFAULT_SOLVER_CONFIG) {
    this.model = model;
    this.config = { ...config };
  }

  solve(topology: CircuitTopology, feedSpec: FeedSpecification, options: RunOptions = {}): StageProfile {
    const feed = resolveFeed(topology, feedSpec);
    const isotherm = this.model.resolve(feed.extractantVv, {
      plsPh: feed.plsPh,
      temperature: feed.temperature,
      stripAcid: feed.stripAcid,
    });
    const flowsheet = buildFlowsheet(topology, feed);

    const ctx: RunContext = {
      topology,
      feed,
      flowsheet,
      isotherm,
      state: {
        raffinate: topology.extractionStages.map(() => feed.plsCopper),
        loaded: topology.extractionStages.map(() => 0),
        stripped: topology.strippingStages.map(() => 0),
        electrolyte: topology.strippingStages.map(() => feed.leanElectrolyteCopper),
      },
      issues: [],
    };

    const nE = topology.extractionStages.length;
    const nS = topology.strippingStages.length;
    const residualHistory: number[] = [];
    let converged = false;
    let sweeps = 0;
    let residual = Number.POSITIVE_INFINITY;

    while (sweeps < this.config.maxSweeps) {
      sweeps++;
      const previous = flatten(ctx.state);

      for (let i = 0; i < nE; i++) this.updateExtractionStage(ctx, i);
      for (let i = nE - 1; i >= 0; i--) this.updateExtractionStage(ctx, i);
      for (let j = 0; j < nS; j++) this.updateStrippingStage(ctx, j);
      for (let j = nS - 1; j >= 0; j--) this.updateStrippingStage(ctx, j);
      if (topology.hasCrossPhaseRecycle) {
        // the bleed carries this sweep's rich electrolyte back into extraction
        for (let i = 0; i < nE; i++) this.updateExtractionStage(ctx, i);
      }

      residual = maxRelativeChange(flatten(ctx.state), previous);
      residualHistory.push(residual);
      if (residual < this.config.tolerance) {
        converged = true;
        break;
      }
      if (options.deadline !== undefined && Date.now() >= options.deadline) {
        ctx.issues.push(`Deadline reached after ${sweeps} sweep(s); residual ${residual.toExponential(2)}.`);
        break;
      }
    }

    if (!converged && sweeps >= this.config.maxSweeps) {
      ctx.issues.push(
        `Did not converge within ${this.config.maxSweeps} sweeps; residual ${residual.toExponential(2)} ` +
          `(tolerance ${this.config.tolerance}).`
      );
    }

    return this.buildProfile(ctx, { converged, sweeps, residual, residualHistory });
  }

  // --- Stage updates ---

  private extractionInlet(ctx: RunContext, i: number): { aqueous: number; organic: number } {
    const { state, flowsheet, feed } = ctx;
    const last = state.raffinate.length - 1;
    return {
      aqueous: mixedInletCopper(flowsheet, i, i > 0 ? state.raffinate[i - 1] : 0, {
        pls: feed.plsCopper,
        raffinate: state.raffinate[last],
        richElectrolyte: state.electrolyte[0],
      }),
      organic: i === last ? state.stripped[state.stripped.length - 1] : state.loaded[i + 1],
    };
  }

  private strippingInlet(ctx: RunContext, j: number): { aqueous: number; organic: number } {
    const { state, feed } = ctx;
    const last = state.electrolyte.length - 1;
    return {
      aqueous: j === last ? feed.leanElectrolyteCopper : state.electrolyte[j + 1],
      organic: j === 0 ? state.loaded[0] : state.stripped[j - 1],
    };
  }

  private updateExtractionStage(ctx: RunContext, i: number): void {
    const { aqueous: xin, organic: yin } = this.extractionInlet(ctx, i);
    const ratio = ctx.flowsheet.organicFlow / ctx.flowsheet.extractionFlows[i]; // O/A through the stage
    const efficiency = ctx.feed.extractionEfficiencies[i];

    // x_out + (O/A)·η·(y*(x_out) − y_in) − x_in = 0
    const balance = (xOut: number) =>
      xOut + ratio * efficiency * (extractionOrganic(ctx.isotherm, xOut) - yin) - xin;
    const xOut = brentRoot(
      balance, 0, xin + ratio * efficiency * yin, this.config.stageTolerance, 100, this.config.stageTolerance
    );
    if (xOut === null) {
      ctx.issues.push(`${ctx.topology.extractionStages[i].label}: stage balance failed to solve.`);
      return;
    }
    ctx.state.raffinate[i] = Math.max(0, xOut);
    ctx.state.loaded[i] = Math.max(0, yin + (xin - xOut) / ratio);
  }

  private updateStrippingStage(ctx: RunContext, j: number): void {
    const { aqueous: ein, organic: zin } = this.strippingInlet(ctx, j);
    const ratio = ctx.flowsheet.organicFlow / ctx.flowsheet.stripLiquorFlow;
    const efficiency = ctx.feed.strippingEfficiencies[j];

    // (e_out − e_in) − (O/A)·η·(z_in − y*ₛ(e_out)) = 0
    const balance = (eOut: number) =>
      eOut - ein - ratio * efficiency * (zin - strippingOrganic(ctx.isotherm, eOut));
    const eOut = brentRoot(
      balance, 0, ein + ratio * efficiency * zin, this.config.stageTolerance, 100, this.config.stageTolerance
    );
    if (eOut === null) {
      ctx.issues.push(`${ctx.topology.strippingStages[j].label}: stage balance failed to solve.`);
      return;
    }
    ctx.state.electrolyte[j] = Math.max(0, eOut);
    ctx.state.stripped[j] = Math.max(0, zin - (eOut - ein) / ratio);
  }

  // --- Result assembly ---

  private buildProfile(
    ctx: RunContext,
    run: { converged: boolean; sweeps: number; residual: number; residualHistory: number[] }
  ): StageProfile {
    const { topology, feed, flowsheet, isotherm, state } = ctx;
    const O = flowsheet.organicFlow;

    const extraction: StageResult[] = topology.extractionStages.map((stage, i) => {
      const inlet = this.extractionInlet(ctx, i);
      const A = flowsheet.extractionFlows[i];
      return {
        phase: stage.phase,
        index: stage.index,
        label: stage.label,
        mixerEfficiency: feed.extractionEfficiencies[i] * 100,
        inlet: { aqueousCopper: inlet.aqueous, organicCopper: inlet.organic, aqueousFlow: A, organicFlow: O },
        outlet: { aqueousCopper: state.raffinate[i], organicCopper: state.loaded[i], aqueousFlow: A, organicFlow: O },
      };
    });

    const stripping: StageResult[] = topology.strippingStages.map((stage, j) => {
      const inlet = this.strippingInlet(ctx, j);
      const As = flowsheet.stripLiquorFlow;
      return {
        phase: stage.phase,
        index: stage.index,
        label: stage.label,
        mixerEfficiency: feed.strippingEfficiencies[j] * 100,
        inlet: { aqueousCopper: inlet.aqueous, organicCopper: inlet.organic, aqueousFlow: As, organicFlow: O },
        outlet: { aqueousCopper: state.electrolyte[j], organicCopper: state.stripped[j], aqueousFlow: As, organicFlow: O },
      };
    });

    const raffinateCopper = state.raffinate[state.raffinate.length - 1];
    const loadedOrganicCopper = state.loaded[0];
    const strippedOrganicCopper = state.stripped[state.stripped.length - 1];
    const richElectrolyteCopper = state.electrolyte[0];
    const lean = feed.leanElectrolyteCopper;

    const copperToStrip = flowsheet.stripLiquorFlow * (richElectrolyteCopper - lean); // kg/h
    const copperPresented = flowsheet.plsFlow * feed.plsCopper + flowsheet.electrolyteBleedFlow * richElectrolyteCopper;
    const transfer = loadedOrganicCopper - strippedOrganicCopper;

    return {
      scenarioId: topology.id,
      extractantVv: feed.extractantVv,
      isotherm,
      flows: toCircuitFlows(flowsheet),
      extraction,
      stripping,
      plsCopper: feed.plsCopper,
      raffinateCopper,
      loadedOrganicCopper,
      strippedOrganicCopper,
      richElectrolyteCopper,
      leanElectrolyteCopper: lean,
      strippingRatio: (copperToStrip / copperPresented) * 100,
      extractionRecovery: ((feed.plsCopper - raffinateCopper) / feed.plsCopper) * 100,
      strippingEfficiency: loadedOrganicCopper > 0 ? (transfer / loadedOrganicCopper) * 100 : 0,
      loadingUtilisation: isotherm.maxLoading > 0 ? (loadedOrganicCopper / isotherm.maxLoading) * 100 : 0,
      netTransfer: transfer / feed.extractantVv,
      converged: run.converged,
      iterations: run.sweeps,
      residual: run.residual,
      diagnostics: {
        residualHistory: run.residualHistory,
        convergenceIssues: ctx.issues,
      },
    };
  }
}
