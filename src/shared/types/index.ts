/**
 * 共有型 - 統合エクスポート
 */

export { type Result, Ok, Err, map, flatMap, match } from './result.js';
