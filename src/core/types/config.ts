// CHANGE: Configuration and CLI option types for the metrics tool
// WHY: Shell parses argv/config files; CORE and APP consume typed, immutable options
// REF: REQ-METRICS-CLI
// SOURCE: n/a

import type { SegmentationMode } from "./construct.js";
import type { Thresholds } from "./metrics.js";

/**
 * Конфигурация из sas-metrics.config.json.
 *
 * Все поля необязательны: отсутствующее поле означает значение по умолчанию.
 */
export interface AnalyzerConfig {
	readonly mode?: SegmentationMode;
	readonly extensions?: readonly string[];
	readonly thresholds?: Partial<Thresholds>;
}

/**
 * Опции командной строки.
 *
 * @property targetPath Файл или директория для анализа
 * @property outputDir Директория для Markdown-отчётов (не задана: отчёты не пишутся)
 * @property extensions Расширения исходных файлов при обходе директории (пусто: из конфигурации)
 * @property configPath Явный путь к файлу конфигурации
 * @property json Печатать записи метрик как JSON вместо сводки
 * @property failOnIssues Возвращать код 1, если найдена хотя бы одна проблема
 */
export interface CLIOptions {
	readonly targetPath: string;
	readonly outputDir: string | undefined;
	readonly extensions: readonly string[];
	readonly mode: SegmentationMode | undefined;
	readonly maxComplexity: number | undefined;
	readonly maxMacroParameters: number | undefined;
	readonly configPath: string | undefined;
	readonly json: boolean;
	readonly failOnIssues: boolean;
}

/**
 * Fully resolved run settings: defaults ← config file ← CLI flags.
 */
export interface ResolvedOptions {
	readonly targetPath: string;
	readonly outputDir: string | undefined;
	readonly extensions: readonly string[];
	readonly mode: SegmentationMode;
	readonly thresholds: Thresholds;
	readonly json: boolean;
	readonly failOnIssues: boolean;
}
