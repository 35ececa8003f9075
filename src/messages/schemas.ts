/**
 * Broadcast payload schemas.
 *
 * Keys are the element names exactly as the logging application writes
 * them, including its mixed casing.
 */

import { z } from 'zod'
import { decimal, flag, group, integer, long, text, timestamp } from './fields.js'

export const appInfoSchema = z.object({
  app: text(),
  dbname: text(),
  contestnr: integer(),
  contestname: text(),
  StationName: text(),
})

/**
 * Contact record, shared by contactinfo, contactreplace and lookupinfo
 */
export const contactInfoSchema = z.object({
  app: text(),
  contestname: text(),
  contestnr: integer(),
  timestamp: timestamp(),
  mycall: text(),
  band: decimal(),
  rxfreq: integer(),
  txfreq: integer(),
  operator: text(),
  mode: text(),
  call: text(),
  countryprefix: text(),
  wpxprefix: text(),
  stationprefix: text(),
  continent: text(),
  snt: text(),
  sntnr: integer(),
  rcv: text(),
  rcvnr: integer(),
  gridsquare: text(),
  exchangel: text(),
  section: text(),
  comment: text(),
  qth: text(),
  name: text(),
  power: text(),
  misctext: text(),
  zone: integer(),
  prec: text(),
  ck: integer(),
  ismultiplierl: text(),
  ismultiplier2: integer(),
  ismultiplier3: integer(),
  points: text(),
  radionr: text(),
  run1run2: text(),
  RoverLocation: text(),
  RadioInterfaced: text(),
  NetworkedCompNr: integer(),
  IsOriginal: flag(),
  NetBiosName: text(),
  IsRunQSO: integer(),
  StationName: text(),
  ID: text(),
  IsClaimedQso: integer(),
})

export const contactDeleteSchema = z.object({
  app: text(),
  timestamp: timestamp(),
  call: text(),
  contestnr: integer(),
  StationName: text(),
  ID: text(),
})

export const spotSchema = z.object({
  app: text(),
  StationName: text(),
  dxcall: text(),
  frequency: decimal(),
  spottercall: text(),
  timestamp: timestamp(),
  action: text(),
  mode: text(),
  comment: text(),
  status: text(),
  statuslist: text(),
})

export const radioInfoSchema = z.object({
  app: text(),
  StationName: text(),
  RadioNr: integer(),
  Freq: long(),
  TXFreq: long(),
  Mode: text(),
  OpCall: text(),
  IsRunning: flag(),
  FocusEntry: integer(),
  EntryWindowHwnd: integer(),
  Antenna: integer(),
  Rotors: text(),
  FocusRadioNr: integer(),
  IsStereo: flag(),
  IsSplit: flag(),
  ActiveRadioNr: integer(),
  IsTransmitting: flag(),
  FunctionKeyCaption: text(),
  RadioName: text(),
  AuxAntSelected: integer(-1),
  AuxAntSelectedName: text(),
  IsConnected: flag(),
})

// <qso band="20" mode="CW">12</qso>; a bare <qso>12</qso> parses to a string
const breakdownEntrySchema = z
  .preprocess(
    (value) => (typeof value === 'string' ? { '#text': value } : value),
    z.object({ band: text(), mode: text(), '#text': integer() })
  )
  .transform((entry) => ({ band: entry.band, mode: entry.mode, count: entry['#text'] }))

export const dynamicResultsSchema = z.object({
  contest: text(),
  call: text(),
  ops: text(),
  class: group({
    power: text(),
    assisted: text(),
    transmitter: text(),
    ops: text(),
    bands: text(),
    mode: text(),
    overlay: text(),
  }),
  club: text(),
  qth: group({
    dxcccountry: text(),
    cqzone: integer(),
    iaruzone: integer(),
    arrlsection: text(),
    stprvoth: text(),
    grid6: text(),
  }),
  breakdown: group({
    qso: z.array(breakdownEntrySchema).default([]),
    point: z.array(breakdownEntrySchema).default([]),
  }),
  score: integer(),
  timestamp: timestamp(),
})

/** Element paths that repeat and always decode to arrays */
export const DYNAMIC_RESULTS_ARRAY_PATHS = ['dynamicresults.breakdown.qso', 'dynamicresults.breakdown.point'] as const

export type AppInfo = z.output<typeof appInfoSchema>
export type ContactInfo = z.output<typeof contactInfoSchema>
export type ContactReplace = ContactInfo
export type LookupInfo = ContactInfo
export type ContactDelete = z.output<typeof contactDeleteSchema>
export type Spot = z.output<typeof spotSchema>
export type RadioInfo = z.output<typeof radioInfoSchema>
export type DynamicResults = z.output<typeof dynamicResultsSchema>
