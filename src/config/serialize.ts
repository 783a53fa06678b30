/**
 * RunConfig -> Circuitscape .ini lines
 *
 * Section headers and key names follow the schema Circuitscape reads;
 * they must not change.
 */

import { getLogFilePath, getOutputFilePath, getProfilerLogPath } from '../utils/paths.js';
import { isAdvancedScenario } from './types.js';
import type { RunConfig } from './types.js';

export type IniEntry =
  | { kind: 'pair'; key: string; value: string }
  | { kind: 'comment'; text: string };

export interface IniSection {
  header: string;
  entries: IniEntry[];
}

export const SECTION_HEADERS = {
  MODE: 'Circuitscape mode',
  HABITAT: 'Habitat raster or graph',
  CONNECTION: 'Connection scheme for raster habitat data',
  FOCAL: 'Options for pairwise and one-to-all and all-to-one modes',
  ADVANCED: 'Options for advanced mode',
  OUTPUT: 'Output options',
  CALCULATION: 'Calculation options',
  LOGGING: 'Logging Options',
  POLYGONS: 'Short circuit regions (aka polygons)',
} as const;

export function formatBoolean(value: boolean): 'true' | 'false' {
  return value ? 'true' : 'false';
}

/**
 * Integer flag form, used by the keys Circuitscape parses as 0/1
 */
export function formatFlag(value: boolean): '1' | '0' {
  return value ? '1' : '0';
}

function pair(key: string, value: string | number): IniEntry {
  return { kind: 'pair', key, value: String(value) };
}

function flag(key: string, value: boolean): IniEntry {
  return pair(key, formatBoolean(value));
}

function comment(text: string): IniEntry {
  return { kind: 'comment', text };
}

function advancedSection(config: RunConfig): IniSection {
  return {
    header: SECTION_HEADERS.ADVANCED,
    entries: [
      flag('ground_file_is_resistances', config.groundFileIsResistance),
      pair('remove_src_or_gnd', config.removeSrcOrGnd),
      config.groundFile ? pair('ground_file', config.groundFile) : comment('ground_file not provided'),
      config.sourceFile ? pair('source_file', config.sourceFile) : comment('source_file not provided'),
      flag('use_unit_currents', config.useUnitCurrents),
      flag('use_direct_grounds', config.useDirectGrounds),
    ],
  };
}

export function buildIniSections(config: RunConfig): IniSection[] {
  const { outputDir, outputName } = config;

  const sections: IniSection[] = [
    {
      header: SECTION_HEADERS.MODE,
      entries: [pair('scenario', config.scenario), pair('data_type', 'raster')],
    },
    {
      header: SECTION_HEADERS.HABITAT,
      entries: [
        pair('habitat_file', config.costFile),
        flag('habitat_map_is_resistances', config.habitatMapIsResistance),
      ],
    },
    {
      header: SECTION_HEADERS.CONNECTION,
      entries: [
        flag('connect_four_neighbors_only', config.connectFourNeighborsOnly),
        flag('connect_using_avg_resistances', config.connectUsingAvgResistances),
      ],
    },
    {
      header: SECTION_HEADERS.FOCAL,
      entries: [pair('point_file', config.focal.path), flag('use_included_pairs', false)],
    },
  ];

  if (isAdvancedScenario(config.scenario)) {
    sections.push(advancedSection(config));
  }

  sections.push(
    {
      header: SECTION_HEADERS.OUTPUT,
      entries: [
        pair('output_file', getOutputFilePath(outputDir, outputName)),
        pair('log_file', getLogFilePath(outputDir, outputName)),
        pair('profiler_log_file', getProfilerLogPath(outputDir, outputName)),
        pair('write_cur_maps', formatFlag(config.writeCurMaps)),
        flag('write_cum_cur_map_only', config.writeCumCurMapOnly),
        flag('write_volt_maps', config.writeVoltMaps),
        flag('log_transform_maps', config.logTransformMaps),
        flag('compress_grids', config.compressGrids),
      ],
    },
    {
      header: SECTION_HEADERS.CALCULATION,
      entries: [
        flag('low_memory_mode', false),
        flag('parallelize', config.parallelize),
        pair('max_parallel', config.maxParallel),
        pair('solver', config.solver),
        flag('preemptive_memory_release', config.preemptiveMemoryRelease),
        pair('print_timings', formatFlag(config.printTimings)),
      ],
    },
    {
      header: SECTION_HEADERS.LOGGING,
      entries: [pair('log_level', config.logLevel), flag('screenprint_log', config.screenprintLog)],
    },
    {
      // Focal polygons go through point_file; short-circuit regions stay off
      header: SECTION_HEADERS.POLYGONS,
      entries: [
        pair('polygon_file', '(Browse for a short-circuit region file)'),
        flag('use_polygons', false),
      ],
    }
  );

  return sections;
}

function renderEntry(entry: IniEntry): string {
  return entry.kind === 'pair' ? `${entry.key} = ${entry.value}` : `# ${entry.text}`;
}

/**
 * Header, entries, and one blank line between sections
 */
export function renderIniLines(sections: IniSection[]): string[] {
  const lines: string[] = [];

  sections.forEach((section, index) => {
    if (index > 0) {
      lines.push('');
    }
    lines.push(`[${section.header}]`);
    lines.push(...section.entries.map(renderEntry));
  });

  return lines;
}

export function serializeConfig(config: RunConfig): string[] {
  return renderIniLines(buildIniSections(config));
}
