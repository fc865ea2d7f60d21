import { describe, it, expect } from 'vitest'
import { isNoResultsMessage, parseSearchResponse } from '../parser'

function segment(from: string, to: string, airline: string, flightNumber: string) {
  return {
    departure_airport: { id: from, time: '2026-06-15 08:00' },
    arrival_airport: { id: to, time: '2026-06-15 11:30' },
    airline,
    flight_number: flightNumber,
    duration: 210,
  }
}

describe('parseSearchResponse', () => {
  it('picks the cheapest offer across best and other flights', () => {
    const result = parseSearchResponse(
      {
        search_metadata: { status: 'Success', google_flights_url: 'https://www.google.com/travel/flights?q=test' },
        search_parameters: { currency: 'USD' },
        best_flights: [{ flights: [segment('JFK', 'LAX', 'Delta', 'DL 1')], price: 320 }],
        other_flights: [
          {
            flights: [segment('JFK', 'ORD', 'United', 'UA 10'), segment('ORD', 'LAX', 'United', 'UA 11')],
            layovers: [{ id: 'ORD' }],
            price: 240,
            total_duration: 420,
            booking_token: 'token-abc',
          },
          { flights: [segment('JFK', 'LAX', 'JetBlue', 'B6 23')], price: 260 },
        ],
      },
      'EUR'
    )

    expect(result).toEqual({
      status: 'OK',
      offer: {
        price: 240,
        currency: 'USD',
        carriers: ['United'],
        details: {
          outboundSegments: [
            {
              departureAirport: 'JFK',
              departureTime: '2026-06-15 08:00',
              arrivalAirport: 'ORD',
              arrivalTime: '2026-06-15 11:30',
              airline: 'United',
              flightNumber: 'UA 10',
              durationMinutes: 210,
            },
            {
              departureAirport: 'ORD',
              departureTime: '2026-06-15 08:00',
              arrivalAirport: 'LAX',
              arrivalTime: '2026-06-15 11:30',
              airline: 'United',
              flightNumber: 'UA 11',
              durationMinutes: 210,
            },
          ],
          returnSegments: [],
          totalDurationMinutes: 420,
          stops: 1,
          bookingToken: 'token-abc',
        },
        link: 'https://www.google.com/travel/flights?q=test',
      },
    })
  })

  it('keeps the first offer when prices tie', () => {
    const result = parseSearchResponse(
      {
        best_flights: [
          { flights: [segment('JFK', 'LAX', 'Delta', 'DL 1')], price: 200, link: 'https://first.example.test' },
          { flights: [segment('JFK', 'LAX', 'Alaska', 'AS 2')], price: 200, link: 'https://second.example.test' },
        ],
      },
      'USD'
    )

    expect(result.status === 'OK' && result.offer.link).toBe('https://first.example.test')
  })

  it('reads a price object and its currency', () => {
    const result = parseSearchResponse(
      { best_flights: [{ flights: [], price: { total: '189.50', currency: 'eur' } }] },
      'USD'
    )

    expect(result.status === 'OK' && result.offer.price).toBe(189.5)
    expect(result.status === 'OK' && result.offer.currency).toBe('EUR')
    expect(result.status === 'OK' && result.offer.link).toBeNull()
  })

  it('skips offers without a usable price', () => {
    const result = parseSearchResponse(
      {
        best_flights: [
          { flights: [segment('JFK', 'LAX', 'Delta', 'DL 1')] },
          { flights: [segment('JFK', 'LAX', 'Delta', 'DL 3')], price: 0 },
          { flights: [segment('JFK', 'LAX', 'Delta', 'DL 5')], price: 410 },
        ],
      },
      'USD'
    )

    expect(result.status === 'OK' && result.offer.price).toBe(410)
  })

  it('skips a malformed offer and keeps its well-formed siblings', () => {
    const result = parseSearchResponse(
      {
        best_flights: [{ flights: [{ airline: 'Delta', flight_number: 'DL 1' }], price: 250 }],
        other_flights: [
          { flights: [{ airline: 'X', flight_number: null }], price: 400 },
          { flights: [{ airline: 'United', flight_number: 'UA 9' }], price: '120' },
        ],
      },
      'USD'
    )

    expect(result.status).toBe('OK')
    expect(result.status === 'OK' && result.offer.price).toBe(250)
    expect(result.status === 'OK' && result.offer.carriers).toEqual(['Delta'])
  })

  it('reports NO_RESULTS when every offer is malformed', () => {
    expect(parseSearchResponse({ best_flights: [null, 'offer', { flights: 'none', price: 90 }] }, 'USD')).toEqual({
      status: 'NO_RESULTS',
      message: 'No priced flight offers returned',
    })
  })

  it('counts stops from segments when layovers are absent', () => {
    const result = parseSearchResponse(
      {
        best_flights: [
          {
            flights: [segment('JFK', 'DFW', 'American', 'AA 1'), segment('DFW', 'LAX', 'American', 'AA 2')],
            price: 150,
          },
        ],
      },
      'USD'
    )

    expect(result.status === 'OK' && result.offer.details.stops).toBe(1)
  })

  it('reports NO_RESULTS when nothing is priced', () => {
    expect(parseSearchResponse({ best_flights: [], other_flights: [] }, 'USD')).toEqual({
      status: 'NO_RESULTS',
      message: 'No priced flight offers returned',
    })
    expect(parseSearchResponse({ search_metadata: { status: 'Success' } }, 'USD').status).toBe('NO_RESULTS')
  })

  it('maps the Google "no results" error to NO_RESULTS', () => {
    const message = "Google Flights hasn't returned any results for this query."

    expect(parseSearchResponse({ error: message }, 'USD')).toEqual({ status: 'NO_RESULTS', message })
  })

  it('maps any other error field to UPSTREAM_ERROR', () => {
    expect(parseSearchResponse({ error: 'Unsupported `departure_id` parameter.' }, 'USD')).toEqual({
      status: 'ERROR',
      code: 'UPSTREAM_ERROR',
      message: 'Unsupported `departure_id` parameter.',
    })
  })

  it('flags bodies that do not match the expected shape', () => {
    expect(parseSearchResponse('<html>Service Unavailable</html>', 'USD')).toEqual({
      status: 'ERROR',
      code: 'MALFORMED_RESPONSE',
      message: 'Unexpected response shape: (root): Expected object, received string',
    })

    const result = parseSearchResponse({ best_flights: 'soon' }, 'USD')
    expect(result.status === 'ERROR' && result.code).toBe('MALFORMED_RESPONSE')
  })
})

describe('isNoResultsMessage', () => {
  it('recognises the no-results wording', () => {
    expect(isNoResultsMessage("Google Flights hasn't returned any results for this query.")).toBe(true)
    expect(isNoResultsMessage('Invalid API key.')).toBe(false)
  })
})
