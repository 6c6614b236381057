import { InvalidRecordError, UnknownActivityError } from './activity-metrics.errors'
import { RaceWalking } from './race-walking'
import { ACTIVITY_FIELDS, isActivityCode, readPackage } from './read-package'
import { Running } from './running'
import { Swimming } from './swimming'

function captureError(fn: () => unknown): unknown {
  try {
    fn()
  } catch (err) {
    return err
  }
  throw new Error('expected function to throw')
}

describe('readPackage', () => {
  it('binds SWM values positionally to a Swimming workout', () => {
    const workout = readPackage('SWM', [720, 1, 80, 25, 40])
    const direct = new Swimming({ action: 720, duration: 1, weight: 80, lengthPool: 25, countPool: 40 })

    expect(workout).toBeInstanceOf(Swimming)
    expect(workout.record).toEqual(direct.record)
    expect(workout.getMetrics()).toEqual(direct.getMetrics())
  })

  it('maps RUN to Running and WLK to RaceWalking', () => {
    expect(readPackage('RUN', [15000, 1, 75])).toBeInstanceOf(Running)

    const walking = readPackage('WLK', [9000, 1, 75, 180])
    expect(walking).toBeInstanceOf(RaceWalking)
    expect(walking.record).toEqual({ action: 9000, duration: 1, weight: 75, height: 180 })
  })

  it.each(['XYZ', 'swm', '', 'toString'])('rejects unknown code %p', (code) => {
    const err = captureError(() => readPackage(code, [1, 1, 1]))

    expect(err).toBeInstanceOf(UnknownActivityError)
    expect(err).toMatchObject({ activityCode: code, message: `Unknown activity type: ${code}` })
  })

  it('rejects a record with the wrong number of values', () => {
    const err = captureError(() => readPackage('RUN', [15000, 1, 75, 180]))

    expect(err).toBeInstanceOf(InvalidRecordError)
    expect(err).toMatchObject({
      activityCode: 'RUN',
      issues: ['expected 3 values (action, duration, weight), got 4'],
    })
  })

  it('rejects race walking without height', () => {
    const err = captureError(() => readPackage('WLK', [9000, 1, 75]))

    expect(err).toMatchObject({
      issues: ['expected 4 values (action, duration, weight, height), got 3'],
    })
  })

  it.each([
    ['SWM', [720, 0, 80, 25, 40]],
    ['RUN', [15000, 0, 75]],
    ['WLK', [9000, 0, 75, 180]],
  ])('rejects zero duration for %s', (code, values) => {
    const err = captureError(() => readPackage(code, values))

    expect(err).toBeInstanceOf(InvalidRecordError)
    expect(err).toMatchObject({ issues: ['duration: Number must be greater than 0'] })
  })

  it('rejects negative duration', () => {
    const err = captureError(() => readPackage('RUN', [15000, -1, 75]))
    expect(err).toMatchObject({ issues: ['duration: Number must be greater than 0'] })
  })

  it('rejects zero height', () => {
    const err = captureError(() => readPackage('WLK', [9000, 1, 75, 0]))
    expect(err).toMatchObject({ issues: ['height: Number must be greater than 0'] })
  })

  it('rejects a fractional action count', () => {
    const err = captureError(() => readPackage('RUN', [1500.5, 1, 75]))
    expect(err).toMatchObject({ issues: ['action: Expected integer, received float'] })
  })

  it('lists every invalid field', () => {
    const err = captureError(() => readPackage('SWM', [720, 1, 0, 25, -1]))

    expect(err).toMatchObject({
      issues: [
        'weight: Number must be greater than 0',
        'countPool: Number must be greater than or equal to 0',
      ],
    })
  })
})

describe('isActivityCode', () => {
  it('accepts exactly the field table codes', () => {
    expect(Object.keys(ACTIVITY_FIELDS).every(isActivityCode)).toBe(true)
    expect(isActivityCode('RUN')).toBe(true)
    expect(isActivityCode('hasOwnProperty')).toBe(false)
  })
})
