import { z } from 'zod'

// Upstream sends numbers, numeric strings ("0.25%", "1,234.5") or null interchangeably.
const NumericField = z.union([z.number(), z.string()]).nullish()
const TextField = z.string().nullish()

export const TESnapshotRowSchema = z.object({
  Category: z.string(),
  Title: TextField,
  CategoryGroup: TextField,
  LatestValue: NumericField,
  LatestValueDate: TextField,
  PreviousValue: NumericField,
  PreviousValueDate: TextField,
  Unit: TextField,
  Frequency: TextField,
  Source: TextField,
})

export const TEHistoricalRowSchema = z.object({
  Category: TextField,
  DateTime: z.string(),
  Value: NumericField,
  HistoricalDataSymbol: TextField,
})

export const TEForecastRowSchema = z.object({
  Category: z.string(),
  Title: TextField,
  q1: NumericField,
  q1_date: TextField,
  q2: NumericField,
  q2_date: TextField,
  q3: NumericField,
  q3_date: TextField,
  q4: NumericField,
  q4_date: TextField,
  YearEnd: NumericField,
  YearEnd2: NumericField,
  YearEnd3: NumericField,
})

export const TEMarketRowSchema = z.object({
  Symbol: z.string(),
  Name: TextField,
  Ticker: TextField,
  Type: TextField,
  Date: TextField,
  Last: NumericField,
  Close: NumericField,
  DailyChange: NumericField,
  DailyPercentualChange: NumericField,
  WeeklyPercentualChange: NumericField,
  MonthlyPercentualChange: NumericField,
  YearlyPercentualChange: NumericField,
  YTDPercentualChange: NumericField,
})

export const TEMarketHistoricalRowSchema = z.object({
  Symbol: TextField,
  Date: z.string(),
  Open: NumericField,
  High: NumericField,
  Low: NumericField,
  Close: NumericField,
})

export const TENewsRowSchema = z.object({
  id: z.union([z.string(), z.number()]).nullish(),
  title: z.string(),
  description: TextField,
  date: TextField,
  category: TextField,
  importance: NumericField,
  url: TextField,
})

export const TECalendarRowSchema = z.object({
  CalendarId: z.union([z.string(), z.number()]).nullish(),
  Date: TextField,
  Event: z.string(),
  Category: TextField,
  Reference: TextField,
  Actual: TextField,
  Previous: TextField,
  Forecast: TextField,
  TEForecast: TextField,
  Importance: NumericField,
  Unit: TextField,
})

export type TESnapshotRow = z.infer<typeof TESnapshotRowSchema>
export type TEHistoricalRow = z.infer<typeof TEHistoricalRowSchema>
export type TEForecastRow = z.infer<typeof TEForecastRowSchema>
export type TEMarketRow = z.infer<typeof TEMarketRowSchema>
export type TEMarketHistoricalRow = z.infer<typeof TEMarketHistoricalRowSchema>
export type TENewsRow = z.infer<typeof TENewsRowSchema>
export type TECalendarRow = z.infer<typeof TECalendarRowSchema>
