export { createPool, fromPool, type Queryable, type QueryOutcome } from './client'
export { RowConversionError } from './errors'
export { EMPTY_FLIGHT_DETAILS, rejectSubjectRow, toPriceRecord, toTrackingSubject, toUser } from './rows'
export { PgSubjectStore, type SubjectStore } from './subject-store'
export { PgUserStore, type UserStore } from './user-store'
export { SETTING_KEYS, SystemSettings, type SettingKey, type SettingsOptions } from './system-settings'
export type {
  ActiveSubjects,
  FlightDetails,
  FlightSegment,
  PriceRecord,
  PriceRecordUpdate,
  PriceSnapshot,
  RejectedSubject,
  StopsPreference,
  TrackingSubject,
  TripType,
  User,
} from './types'
