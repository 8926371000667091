/**
 * 固定小数点（NUMERIC）文字列ユーティリティ
 *
 * @description 観測値は number を経由させず、正規化した10進文字列のまま DB の NUMERIC 列へ渡す
 */

const DECIMAL_PATTERN = /^([+-])?(\d*)(?:\.(\d*))?$/;

export interface FixedPointOptions {
  /** 全体の桁数（デフォルト: 20） */
  precision?: number;
  /** 小数部の桁数（デフォルト: 10） */
  scale?: number;
}

/**
 * 10進文字列を NUMERIC(precision, scale) の正規形に変換
 *
 * - 指数表記・空文字・符号のみは不可
 * - 小数部が scale を超える場合は四捨五入（0 から遠い方へ）
 * - 整数部が precision - scale 桁を超える場合は不可
 *
 * @returns 正規化した文字列（例: "007.50" → "7.5"）。変換不可なら null
 */
export function toFixedPoint(input: string, options?: FixedPointOptions): string | null {
  const precision = options?.precision ?? 20;
  const scale = options?.scale ?? 10;

  const match = DECIMAL_PATTERN.exec(input.trim());
  if (!match) {
    return null;
  }

  const [, sign, intDigits = '', fracDigits = ''] = match;
  if (intDigits === '' && fracDigits === '') {
    return null;
  }

  // 整数部と小数部を scale 桁の整数に揃えて BigInt で丸める
  const kept = fracDigits.slice(0, scale).padEnd(scale, '0');
  let scaled = BigInt(`${intDigits || '0'}${kept}`);
  const roundDigit = fracDigits.charAt(scale);
  if (roundDigit !== '' && Number(roundDigit) >= 5) {
    scaled += 1n;
  }

  const digits = scaled.toString().padStart(scale + 1, '0');
  const integerPart = digits.slice(0, digits.length - scale);
  const fractionPart = digits.slice(digits.length - scale).replace(/0+$/, '');

  if (integerPart.length > precision - scale) {
    return null;
  }

  const negative = sign === '-' && scaled !== 0n;
  return `${negative ? '-' : ''}${integerPart}${fractionPart ? `.${fractionPart}` : ''}`;
}
