export type PageTexts = readonly string[]

export type ParsedHeader = {
  id: number | null
  name: string
  current: number | null
  total: number | null
}

export type TocEntry = {
  rawId: string
  name: string
  page: number | null
}

export type HeaderBlock = {
  id: number
  startPage: number
  endPage: number
}

export type SheetsRecord = Record<number, Record<string, number[]>>

export type WorkingSheetsSnapshot = {
  filename: string
  path: string
  working_sheets: Record<string, Record<string, number[]>>
}
