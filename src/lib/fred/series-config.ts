/**
 * FRED 取得対象系列の定義（シリーズレジストリ）
 *
 * @description series_id → 表示名・単位・頻度などのメタ情報。
 * レジストリは不変の設定テーブルとしてオーケストレーターへ引数で渡す
 */

export interface SeriesDefinition {
  /** FRED series_id（series_metadata の主キー） */
  seriesId: string;
  /** 指標名 */
  name: string;
  /** 説明 */
  description: string;
  /** 単位 */
  units: string;
  /** 更新頻度 */
  frequency: 'Daily' | 'Weekly' | 'Monthly' | 'Quarterly' | 'Annual';
  /** 季節調整 */
  seasonalAdjustment: string;
  /** 取得可能な最古の観測日 (YYYY-MM-DD) */
  observationStart: string | null;
}

export type SeriesRegistry = readonly Readonly<SeriesDefinition>[];

/**
 * 既定の8系列
 */
const DEFAULT_SERIES: SeriesDefinition[] = [
  {
    seriesId: 'GDP',
    name: 'Gross Domestic Product (Nominal)',
    description: 'Gross Domestic Product, 1 Decimal',
    units: 'Billions of Dollars',
    frequency: 'Quarterly',
    seasonalAdjustment: 'Seasonally Adjusted Annual Rate',
    observationStart: '1947-01-01',
  },
  {
    seriesId: 'GDPC1',
    name: 'Real Gross Domestic Product',
    description: 'Real Gross Domestic Product, 3 Decimal',
    units: 'Billions of Chained 2017 Dollars',
    frequency: 'Quarterly',
    seasonalAdjustment: 'Seasonally Adjusted Annual Rate',
    observationStart: '1947-01-01',
  },
  {
    seriesId: 'CPIAUCSL',
    name: 'Consumer Price Index for All Urban Consumers: All Items',
    description:
      'Consumer Price Index for All Urban Consumers: All Items in U.S. City Average, Seasonally Adjusted, Index 1982-1984=100',
    units: 'Index 1982-1984=100',
    frequency: 'Monthly',
    seasonalAdjustment: 'Seasonally Adjusted',
    observationStart: '1947-01-01',
  },
  {
    seriesId: 'UNRATE',
    name: 'Unemployment Rate',
    description: 'Unemployment Rate, Seasonally Adjusted',
    units: 'Percent',
    frequency: 'Monthly',
    seasonalAdjustment: 'Seasonally Adjusted',
    observationStart: '1948-01-01',
  },
  {
    seriesId: 'INDPRO',
    name: 'Industrial Production Index',
    description: 'Industrial Production Index, Seasonally Adjusted',
    units: 'Index 2017=100',
    frequency: 'Monthly',
    seasonalAdjustment: 'Seasonally Adjusted',
    observationStart: '1919-01-01',
  },
  {
    seriesId: 'DCOILWTICO',
    name: 'Crude Oil Prices: West Texas Intermediate (WTI) - Cushing, Oklahoma',
    description:
      'Crude Oil Prices: West Texas Intermediate (WTI) - Cushing, Oklahoma, Dollars per Barrel',
    units: 'Dollars per Barrel',
    frequency: 'Daily',
    seasonalAdjustment: 'Not Seasonally Adjusted',
    observationStart: '1986-01-02',
  },
  {
    seriesId: 'MHHNGSP',
    name: 'Henry Hub Natural Gas Spot Price',
    description: 'Henry Hub Natural Gas Spot Price, Dollars per Million BTU',
    units: 'Dollars per Million BTU',
    frequency: 'Monthly',
    seasonalAdjustment: 'Not Seasonally Adjusted',
    observationStart: '1997-01-01',
  },
  {
    seriesId: 'FEDFUNDS',
    name: 'Federal Funds Effective Rate',
    description: 'Federal Funds Effective Rate, Percent',
    units: 'Percent',
    frequency: 'Daily',
    seasonalAdjustment: 'Not Seasonally Adjusted',
    observationStart: '1954-07-01',
  },
];

/**
 * 定義配列から不変のレジストリを作成
 *
 * @throws series_id が空、または重複している場合
 */
export function createSeriesRegistry(definitions: readonly SeriesDefinition[]): SeriesRegistry {
  const seen = new Set<string>();

  for (const definition of definitions) {
    if (definition.seriesId.trim() === '') {
      throw new Error('Series registry contains an empty seriesId');
    }
    if (seen.has(definition.seriesId)) {
      throw new Error(`Duplicate seriesId in series registry: ${definition.seriesId}`);
    }
    seen.add(definition.seriesId);
  }

  return Object.freeze(definitions.map((definition) => Object.freeze({ ...definition })));
}

/**
 * 既定レジストリ
 */
export const DEFAULT_SERIES_REGISTRY: SeriesRegistry = createSeriesRegistry(DEFAULT_SERIES);

/**
 * レジストリから指定 series_id のみを（レジストリ順で）抽出
 *
 * @throws レジストリにない series_id が含まれる場合
 */
export function selectSeries(registry: SeriesRegistry, seriesIds: readonly string[]): SeriesRegistry {
  const known = new Set(registry.map((definition) => definition.seriesId));
  const unknown = seriesIds.filter((id) => !known.has(id));
  if (unknown.length > 0) {
    throw new Error(`Unknown series in selection: ${unknown.join(', ')}`);
  }

  const wanted = new Set(seriesIds);
  return Object.freeze(registry.filter((definition) => wanted.has(definition.seriesId)));
}
