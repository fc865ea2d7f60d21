/**
 * In-process stand-ins shared by the fare-checker tests
 */

import type {
  ActiveSubjects,
  FlightDetails,
  PriceRecord,
  PriceRecordUpdate,
  RejectedSubject,
  SubjectStore,
  TrackingSubject,
  User,
  UserStore,
} from '@farewatch/db'
import type { FlightOffer, PriceQuery, PriceQueryResult, PriceSource } from '../price-source/types'

export const NOW = new Date('2026-03-01T06:00:00.000Z')

export function makeSubject(overrides: Partial<TrackingSubject> = {}): TrackingSubject {
  return {
    id: 'sub-1',
    userId: 'user-1',
    origin: 'JFK',
    destination: 'LAX',
    departureDate: '2026-06-15',
    returnDate: null,
    tripType: 'ONE_WAY',
    preferredCarriers: [],
    stops: 0,
    passengers: 1,
    ...overrides,
  }
}

export const NO_DETAILS: FlightDetails = {
  outboundSegments: [],
  returnSegments: [],
  totalDurationMinutes: null,
  stops: null,
  bookingToken: null,
}

export function makeOffer(price: number, overrides: Partial<FlightOffer> = {}): FlightOffer {
  return {
    price,
    currency: 'USD',
    carriers: ['Delta'],
    details: NO_DETAILS,
    link: 'https://flights.example.test/offer',
    ...overrides,
  }
}

export function makeRecord(overrides: Partial<PriceRecord> = {}): PriceRecord {
  return {
    subjectId: 'sub-1',
    minimumPrice: 300,
    lastCheckedAt: new Date('2026-02-27T06:00:00.000Z'),
    lastNotifiedPrice: null,
    latest: makeOffer(300),
    ...overrides,
  }
}

export class InMemorySubjectStore implements SubjectStore {
  readonly records = new Map<string, PriceRecord>()
  readonly upserts: Array<{ subjectId: string; update: PriceRecordUpdate }> = []
  readonly failGetFor = new Set<string>()
  readonly failUpsertFor = new Set<string>()
  readonly rejectedRows: RejectedSubject[] = []
  listingError: Error | null = null

  constructor(private readonly subjects: TrackingSubject[] = []) {}

  async listActiveSubjects(asOf: string): Promise<ActiveSubjects> {
    if (this.listingError) throw this.listingError
    const subjects = this.subjects
      .filter((subject) => subject.departureDate >= asOf)
      .sort((a, b) => a.departureDate.localeCompare(b.departureDate) || a.id.localeCompare(b.id))
    return { subjects, rejected: [...this.rejectedRows] }
  }

  async getPriceRecord(subjectId: string): Promise<PriceRecord | null> {
    if (this.failGetFor.has(subjectId)) throw new Error(`read failed for ${subjectId}`)
    return this.records.get(subjectId) ?? null
  }

  async upsertPriceRecord(subjectId: string, update: PriceRecordUpdate): Promise<PriceRecord> {
    if (this.failUpsertFor.has(subjectId)) throw new Error('connection terminated unexpectedly')
    const previous = this.records.get(subjectId)
    const record: PriceRecord = {
      subjectId,
      minimumPrice: update.minimumPrice,
      lastCheckedAt: update.lastCheckedAt,
      lastNotifiedPrice: previous?.lastNotifiedPrice ?? null,
      latest: update.latest,
    }
    this.records.set(subjectId, record)
    this.upserts.push({ subjectId, update })
    return record
  }

  async markPriceNotified(subjectId: string, price: number): Promise<boolean> {
    const record = this.records.get(subjectId)
    if (!record) return false
    this.records.set(subjectId, { ...record, lastNotifiedPrice: price })
    return true
  }
}

export class InMemoryUserStore implements UserStore {
  private readonly users = new Map<string, User>()

  constructor(users: User[] = []) {
    for (const user of users) this.users.set(user.id, user)
  }

  async getUserById(userId: string): Promise<User | null> {
    return this.users.get(userId) ?? null
  }
}

type Responder = (query: PriceQuery) => PriceQueryResult | Promise<PriceQueryResult>

export class StubPriceSource implements PriceSource {
  readonly queries: PriceQuery[] = []

  constructor(private readonly respond: Responder) {}

  async search(query: PriceQuery): Promise<PriceQueryResult> {
    this.queries.push(query)
    return this.respond(query)
  }
}

export function ok(price: number, overrides: Partial<FlightOffer> = {}): PriceQueryResult {
  return { status: 'OK', offer: makeOffer(price, overrides) }
}
