import type { EChartsOption, SeriesOption } from 'echarts';
import type { DiagramPoint, McCabeThieleDiagram, McCabeThieleSection, PhaseKind } from './sx-types';

type EChartsPoint = [number, number] | [number | null, number | null];

export interface ChartOptionSettings {
  dark?: boolean;
  title?: string;
}

const toPoint = (p: DiagramPoint): EChartsPoint => [p.aqueous, p.organic];

/** Staircase as one polyline; [null, null] breaks the line between stages. */
export function staircaseData(section: McCabeThieleSection): EChartsPoint[] {
  const data: EChartsPoint[] = [];
  section.stageSteps.forEach(([from, to], k) => {
    // a stage is two joined segments; break before each new stage
    if (k > 0 && k % 2 === 0) data.push([null, null]);
    if (k % 2 === 0) data.push(toPoint(from));
    data.push(toPoint(to));
  });
  return data;
}

function axisMax(values: number[]): number {
  const max = Math.max(0, ...values);
  return max > 0 ? Number((max * 1.05).toPrecision(3)) : 1;
}

/**
 * ECharts option for one section of the McCabe-Thiele diagram. Rendering
 * stays with the caller; this only shapes the series.
 */
export function buildMcCabeThieleChartOption(
  diagram: McCabeThieleDiagram,
  section: PhaseKind,
  settings: ChartOptionSettings = {}
): EChartsOption {
  const data: McCabeThieleSection = section === 'extraction' ? diagram : diagram.stripping;
  const textColor = settings.dark ? 'white' : '#000000';
  const aqueousLabel = section === 'extraction' ? 'Aqueous Cu (g/L)' : 'Electrolyte Cu (g/L)';
  const title = settings.title
    ?? `${section === 'extraction' ? 'Extraction' : 'Stripping'} McCabe-Thiele${diagram.provisional ? ' (not converged)' : ''}`;

  const allPoints = [...data.equilibriumCurve, ...data.operatingLine, ...data.stagePoints];

  const series: SeriesOption[] = [
    { name: 'Equilibrium Line', type: 'line', data: data.equilibriumCurve.map(toPoint), color: 'blue', symbol: 'none', smooth: true, lineStyle: { width: 2.5 }, animation: false },
    { name: 'Operating Line', type: 'line', data: data.operatingLine.map(toPoint), color: 'orange', symbol: 'none', lineStyle: { width: 2.5 }, animation: false },
    { name: 'Stages', type: 'line', data: staircaseData(data), color: textColor, symbol: 'none', lineStyle: { width: 2 }, connectNulls: false, animation: false },
    {
      name: 'Stage Outlets',
      type: 'scatter',
      data: data.stagePoints.map((p, i) => ({
        value: toPoint(p),
        name: `${section === 'extraction' ? 'E' : 'S'}${i + 1}`,
      })),
      symbolSize: 8,
      color: 'red',
      animation: false,
    },
  ];

  return {
    backgroundColor: 'transparent',
    title: { text: title, left: 'center', textStyle: { color: textColor, fontSize: 18 } },
    grid: { left: '5%', right: '5%', bottom: '5%', top: '10%', containLabel: true },
    xAxis: {
      type: 'value', min: 0, max: axisMax(allPoints.map(p => p.aqueous)),
      name: aqueousLabel, nameLocation: 'middle', nameGap: 30,
      nameTextStyle: { color: textColor }, axisLine: { lineStyle: { color: textColor } },
      axisLabel: { color: textColor }, splitLine: { show: false },
    },
    yAxis: {
      type: 'value', min: 0, max: axisMax(allPoints.map(p => p.organic)),
      name: 'Organic Cu (g/L)', nameLocation: 'middle', nameGap: 40,
      nameTextStyle: { color: textColor }, axisLine: { lineStyle: { color: textColor } },
      axisLabel: { color: textColor }, splitLine: { show: false },
    },
    legend: {
      orient: 'vertical', right: '2%', top: 'center',
      data: ['Equilibrium Line', 'Operating Line', 'Stage Outlets'],
      textStyle: { color: textColor, fontSize: 12 },
    },
    tooltip: { show: true, trigger: 'item' },
    series,
  };
}
