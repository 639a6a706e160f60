export type WorkbookProfile = {
  tocStartMarkers: string[]
  tocEndMarkers: string[]
  tocWindowPages: number
  tocLookaheadChars: number
  headerBandLines: number
  headerBandChars: number
  // digit-pair disambiguation, see determineLastPage
  absoluteSpanLimit: number
  maxCountTotal: number
  sparseHeaderDivisor: number
}

const BELTZ_WORKBOOK_PROFILE: WorkbookProfile = {
  tocStartMarkers: ['Übersicht Arbeitsblätter', 'Overview of Worksheets'],
  tocEndMarkers: ['Übersicht Informationsblätter', 'Overview of Information Sheets'],
  tocWindowPages: 8,
  tocLookaheadChars: 250,
  headerBandLines: 12,
  headerBandChars: 400,
  absoluteSpanLimit: 500,
  maxCountTotal: 400,
  sparseHeaderDivisor: 30,
}

export const DEFAULT_PROFILE: WorkbookProfile = BELTZ_WORKBOOK_PROFILE

export function loadWorkbookProfile(kind = 'default', overrides: Partial<WorkbookProfile> = {}): WorkbookProfile {
  switch (kind) {
    default:
      return { ...BELTZ_WORKBOOK_PROFILE, ...overrides }
  }
}
