import type {
  DiagramPoint,
  DiagramSegment,
  McCabeThieleDiagram,
  McCabeThieleSection,
  ProjectorConfig,
  ResolvedIsotherm,
  StageProfile,
} from './sx-types';
import { DEFAULT_PROJECTOR_CONFIG } from './sx-config';
import { extractionOrganic, strippingOrganic } from './sx-equilibrium';

const point = (aqueous: number, organic: number): DiagramPoint => ({ aqueous, organic });

function sameConcentration(a: number, b: number): boolean {
  return Math.abs(a - b) <= 1e-12 * Math.max(Math.abs(a), Math.abs(b), 1);
}

/**
 * Turns a solved profile into McCabe-Thiele series: organic copper (y axis)
 * against aqueous copper (x axis) for both the extraction and stripping
 * sections. Pure projection; nothing is re-solved.
 */
export class McCabeThieleProjector {
  readonly config: ProjectorConfig;

  constructor(config: ProjectorConfig = DEFAULT_PROJECTOR_CONFIG) {
    this.config = { ...config };
  }

  project(profile: StageProfile): McCabeThieleDiagram {
    return {
      ...this.extractionSection(profile),
      stripping: this.strippingSection(profile),
      provisional: !profile.converged,
    };
  }

  private curve(
    isotherm: ResolvedIsotherm,
    largestAqueous: number,
    equilibrium: (isotherm: ResolvedIsotherm, aqueous: number) => number
  ): DiagramPoint[] {
    const n = Math.max(2, Math.floor(this.config.curvePoints));
    const upper = largestAqueous * this.config.rangePadding;
    return Array.from({ length: n }, (_, k) => {
      const aqueous = (upper * k) / (n - 1);
      return point(aqueous, equilibrium(isotherm, aqueous));
    });
  }

  private extractionSection(profile: StageProfile): McCabeThieleSection {
    const stages = profile.extraction;
    const largest = Math.max(...stages.flatMap(s => [s.inlet.aqueousCopper, s.outlet.aqueousCopper]));

    // Walk from the feed end: stage i passes aqueous x_i downstream and
    // receives organic from stage i + 1 (or the stripped organic at the end).
    const operatingLine: DiagramPoint[] = [point(stages[0].inlet.aqueousCopper, stages[0].outlet.organicCopper)];
    stages.forEach((stage, i) => {
      operatingLine.push(point(stage.outlet.aqueousCopper, stage.inlet.organicCopper));
      const next = stages[i + 1];
      if (next && !sameConcentration(next.inlet.aqueousCopper, stage.outlet.aqueousCopper)) {
        // routed inflow shifts the next stage's feed
        operatingLine.push(point(next.inlet.aqueousCopper, next.outlet.organicCopper));
      }
    });

    const stageSteps: DiagramSegment[] = stages.flatMap((stage): DiagramSegment[] => [
      [
        point(stage.inlet.aqueousCopper, stage.outlet.organicCopper),
        point(stage.outlet.aqueousCopper, stage.outlet.organicCopper),
      ],
      [
        point(stage.outlet.aqueousCopper, stage.outlet.organicCopper),
        point(stage.outlet.aqueousCopper, stage.inlet.organicCopper),
      ],
    ]);

    return {
      equilibriumCurve: this.curve(profile.isotherm, largest, extractionOrganic),
      operatingLine,
      stagePoints: stages.map(stage => point(stage.outlet.aqueousCopper, stage.outlet.organicCopper)),
      stageSteps,
    };
  }

  private strippingSection(profile: StageProfile): McCabeThieleSection {
    const stages = profile.stripping;
    const largest = Math.max(...stages.flatMap(s => [s.inlet.aqueousCopper, s.outlet.aqueousCopper]));

    const operatingLine: DiagramPoint[] = [point(stages[0].outlet.aqueousCopper, stages[0].inlet.organicCopper)];
    for (const stage of stages) {
      operatingLine.push(point(stage.inlet.aqueousCopper, stage.outlet.organicCopper));
    }

    const stageSteps: DiagramSegment[] = stages.flatMap((stage): DiagramSegment[] => [
      [
        point(stage.outlet.aqueousCopper, stage.inlet.organicCopper),
        point(stage.outlet.aqueousCopper, stage.outlet.organicCopper),
      ],
      [
        point(stage.outlet.aqueousCopper, stage.outlet.organicCopper),
        point(stage.inlet.aqueousCopper, stage.outlet.organicCopper),
      ],
    ]);

    return {
      equilibriumCurve: this.curve(profile.isotherm, largest, strippingOrganic),
      operatingLine,
      stagePoints: stages.map(stage => point(stage.outlet.aqueousCopper, stage.outlet.organicCopper)),
      stageSteps,
    };
  }
}
