/**
 * CHANGE: Централизованные ре-экспорты Node built-ins для SHELL-модулей
 * WHY: Один источник импортов fs/path для collector, loader и report writer
 * REF: REQ-METRICS-CLI
 *
 * Инвариант: экспортируем совместимые объекты, избегая `export *` для модулей с `export =`.
 */
import * as fsNS from "node:fs";
import * as pathNS from "node:path";

// CHANGE: Ре-экспорт через константы вместо `export *`
// WHY: node:path (и часто node:fs) используют `export =`, что несовместимо с `export *`
// REF: TypeScript limitation for `export =`
export const fs = fsNS;
export const path = pathNS;
