import { NextResponse } from 'next/server';
import { createSxEngine } from '@/lib/sx-circuit';
import { loadSxConfigFromEnv } from '@/lib/sx-config';
import { buildMcCabeThieleChartOption } from '@/lib/sx-chart-options';
import { isSxCircuitError, type SxErrorKind } from '@/lib/sx-errors';
import { summarizeProfile } from '@/lib/sx-report';
import { parseSxCircuitRequest } from '@/lib/sx-request';
import { listScenarios } from '@/lib/sx-scenario-catalog';
import { describeStageCounts } from '@/lib/sx-topology';
import type { StageProfile } from '@/lib/sx-types';

const engine = createSxEngine(loadSxConfigFromEnv());

const STATUS_BY_KIND: Record<SxErrorKind, number> = {
  'configuration': 400,
  'invalid-input': 400,
  'unknown-scenario': 404,
  'unreachable-target': 422,
};

export async function GET() {
  const scenarios = listScenarios().map(topology => ({
    id: topology.id,
    name: topology.name,
    description: topology.description,
    stages: describeStageCounts(topology),
    extractionStages: topology.extractionStages.length,
    strippingStages: topology.strippingStages.length,
    routing: topology.routing,
    crossPhaseRecycle: topology.hasCrossPhaseRecycle,
  }));
  return NextResponse.json({ scenarios });
}

export async function POST(request: Request) {
  console.log("DEBUG: SX circuit API route called");
  try {
    let body: unknown;
    try {
      body = await request.json();
    } catch (parseError) {
      console.error("DEBUG ERROR: Request body is not valid JSON:", parseError);
      return NextResponse.json({ error: 'Request body must be valid JSON', kind: 'invalid-input' }, { status: 400 });
    }

    const input = parseSxCircuitRequest(body);
    console.log(`DEBUG: Running ${input.mode} mode for scenario ${input.scenario}`);

    const profile: StageProfile = input.mode === 'plant'
      ? engine.simulatePlant(input.scenario, input.feed)
      : engine.optimizeForTarget(input.scenario, input.feed, input.target, input.searchBounds, input.tolerance);

    if (!profile.converged) {
      console.log(`DEBUG: Scenario ${input.scenario} did not converge:`, profile.diagnostics.convergenceIssues);
    }

    const diagram = engine.projectDiagram(profile);
    const sensitivity = engine.analyzeSensitivity(input.scenario, { ...input.feed, extractantVv: profile.extractantVv }, profile);

    console.log(`DEBUG: Scenario ${input.scenario} solved in ${profile.iterations} sweeps, stripping ratio ${profile.strippingRatio.toFixed(2)}%`);
    return NextResponse.json({
      mode: input.mode,
      scenario: input.scenario,
      results: summarizeProfile(profile),
      profile,
      chartData: {
        diagram,
        extraction: buildMcCabeThieleChartOption(diagram, 'extraction'),
        stripping: buildMcCabeThieleChartOption(diagram, 'stripping'),
      },
      recommendations: sensitivity.recommendations,
    });
  } catch (error: unknown) {
    if (isSxCircuitError(error)) {
      console.error(`DEBUG ERROR: ${error.kind}: ${error.message}`);
      return NextResponse.json({ error: error.message, kind: error.kind }, { status: STATUS_BY_KIND[error.kind] });
    }
    console.error('DEBUG ERROR: API route error:', error);
    return NextResponse.json(
      { error: error instanceof Error ? error.message : 'Failed to process request', kind: 'internal' },
      { status: 500 }
    );
  }
}
