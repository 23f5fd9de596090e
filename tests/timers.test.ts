import { describe, it } from 'node:test'
import assert from 'node:assert/strict'
import { TimerScheduler, TimerDriverConflictError, type TimerDriver, type TimerHandle } from '../src/rpc/timers.js'
import { EventLoopTimerDriver } from '../src/rpc/event-loop-timer.js'
import { RpcError, RpcErrorCode } from '../src/rpc/protocol.js'
import { FakeTimerDriver } from './helpers.js'

describe('TimerScheduler driver registration', () => {
  it('rejects a second driver while one is registered', () => {
    const scheduler = new TimerScheduler()
    scheduler.registerDriver(new FakeTimerDriver('A'))
    assert.throws(
      () => scheduler.registerDriver(new FakeTimerDriver('B')),
      TimerDriverConflictError,
    )
    assert.equal(scheduler.driverName, 'A')
  })

  it('re-registering the same driver is a no-op', () => {
    const scheduler = new TimerScheduler()
    const driver = new FakeTimerDriver()
    scheduler.registerDriver(driver)
    scheduler.registerDriver(driver)
    assert.equal(scheduler.driverName, 'Fake')
  })

  it('only unregisters the current driver', () => {
    const scheduler = new TimerScheduler()
    const driver = new FakeTimerDriver('A')
    scheduler.registerDriver(driver)

    assert.equal(scheduler.unregisterDriver(new FakeTimerDriver('B')), false)
    assert.equal(scheduler.driverName, 'A')
    assert.equal(scheduler.unregisterDriver(driver), true)
    assert.equal(scheduler.driverName, null)

    scheduler.registerDriver(new FakeTimerDriver('B'))
    assert.equal(scheduler.driverName, 'B')
  })
})

describe('TimerScheduler.runLater', () => {
  it('fails with NoTimerDriver when no driver is registered', () => {
    const scheduler = new TimerScheduler()
    assert.throws(
      () => scheduler.runLater('x', () => {}, 5),
      (err) => {
        assert.ok(err instanceof RpcError)
        assert.equal(err.kind, 'NoTimerDriver')
        assert.equal(err.code, RpcErrorCode.INTERNAL_ERROR)
        assert.equal(err.message, 'No timer handler registered for RPC')
        return true
      },
    )
    assert.equal(scheduler.pendingCount, 0)
  })

  it('converts seconds to milliseconds for the driver', () => {
    const scheduler = new TimerScheduler()
    const driver = new FakeTimerDriver()
    scheduler.registerDriver(driver)
    scheduler.runLater('lockwallet', () => {}, 5)
    assert.equal(driver.timers[0]!.delayMillis, 5000)
  })

  it('replaces a pending callback registered under the same name', () => {
    const scheduler = new TimerScheduler()
    const driver = new FakeTimerDriver()
    scheduler.registerDriver(driver)

    const fired: string[] = []
    scheduler.runLater('x', () => fired.push('cb1'), 5)
    scheduler.runLater('x', () => fired.push('cb2'), 5)

    assert.equal(scheduler.pendingCount, 1)
    assert.equal(driver.liveCount, 1)

    driver.fireAll()
    assert.deepEqual(fired, ['cb2'])
    assert.equal(scheduler.has('x'), false)
  })

  it('keeps callbacks under different names independent', () => {
    const scheduler = new TimerScheduler()
    const driver = new FakeTimerDriver()
    scheduler.registerDriver(driver)

    const fired: string[] = []
    scheduler.runLater('a', () => fired.push('a'), 1)
    scheduler.runLater('b', () => fired.push('b'), 1)
    assert.equal(scheduler.pendingCount, 2)

    driver.fireAll()
    assert.deepEqual(fired, ['a', 'b'])
    assert.equal(scheduler.pendingCount, 0)
  })

  it('cancel(name) stops a pending callback', () => {
    const scheduler = new TimerScheduler()
    const driver = new FakeTimerDriver()
    scheduler.registerDriver(driver)

    let fired = false
    scheduler.runLater('x', () => { fired = true }, 1)
    assert.equal(scheduler.cancel('x'), true)
    assert.equal(scheduler.cancel('x'), false)

    driver.fireAll()
    assert.equal(fired, false)
  })

  it('clear() cancels every pending callback', () => {
    const scheduler = new TimerScheduler()
    const driver = new FakeTimerDriver()
    scheduler.registerDriver(driver)

    scheduler.runLater('a', () => assert.fail('a fired'), 1)
    scheduler.runLater('b', () => assert.fail('b fired'), 1)
    scheduler.clear()

    assert.equal(scheduler.pendingCount, 0)
    assert.equal(driver.liveCount, 0)
  })

  it('a throwing callback does not break other timers', () => {
    const scheduler = new TimerScheduler()
    const driver = new FakeTimerDriver()
    scheduler.registerDriver(driver)

    let secondFired = false
    scheduler.runLater('bad', () => { throw new Error('boom') }, 1)
    scheduler.runLater('good', () => { secondFired = true }, 1)

    driver.fireAll()
    assert.equal(secondFired, true)
  })

  it('a callback may reschedule itself under its own name', () => {
    const scheduler = new TimerScheduler()
    const driver = new FakeTimerDriver()
    scheduler.registerDriver(driver)

    let runs = 0
    const tick = () => {
      runs += 1
      if (runs < 3) scheduler.runLater('tick', tick, 1)
    }
    scheduler.runLater('tick', tick, 1)

    driver.fireAll()
    driver.fireAll()
    driver.fireAll()
    assert.equal(runs, 3)
    assert.equal(scheduler.has('tick'), false)
  })
})

describe('TimerScheduler with a synchronous driver', () => {
  /** Driver that runs every callback immediately inside newTimer. */
  class ImmediateDriver implements TimerDriver {
    name(): string {
      return 'Immediate'
    }

    newTimer(callback: () => void): TimerHandle {
      callback()
      return { cancel() {} }
    }
  }

  it('runs the callback and leaves no pending entry', () => {
    const scheduler = new TimerScheduler()
    scheduler.registerDriver(new ImmediateDriver())

    let fired = 0
    scheduler.runLater('now', () => { fired += 1 }, 0)

    assert.equal(fired, 1)
    assert.equal(scheduler.has('now'), false)
    assert.equal(scheduler.pendingCount, 0)
  })

  it('runs back-to-back callbacks under one name without leaving entries', () => {
    const scheduler = new TimerScheduler()
    scheduler.registerDriver(new ImmediateDriver())

    const fired: string[] = []
    scheduler.runLater('x', () => fired.push('first'), 0)
    scheduler.runLater('x', () => fired.push('second'), 0)

    assert.deepEqual(fired, ['first', 'second'])
    assert.equal(scheduler.pendingCount, 0)
  })
})

describe('EventLoopTimerDriver', () => {
  it('reports its name', () => {
    assert.equal(new EventLoopTimerDriver().name(), 'EventLoop')
  })

  it('runs the callback after the delay', async () => {
    const driver = new EventLoopTimerDriver()
    await new Promise<void>((resolve) => {
      driver.newTimer(resolve, 5)
    })
  })

  it('does not run a cancelled callback', async () => {
    const driver = new EventLoopTimerDriver()
    let fired = false
    const handle = driver.newTimer(() => { fired = true }, 5)
    handle.cancel()
    handle.cancel()
    await new Promise((resolve) => setTimeout(resolve, 30))
    assert.equal(fired, false)
  })

  it('works as the scheduler backend', async () => {
    const scheduler = new TimerScheduler()
    scheduler.registerDriver(new EventLoopTimerDriver())

    const fired: string[] = []
    await new Promise<void>((resolve) => {
      scheduler.runLater('x', () => fired.push('old'), 0.005)
      scheduler.runLater('x', () => {
        fired.push('new')
        resolve()
      }, 0.005)
    })
    await new Promise((resolve) => setTimeout(resolve, 20))
    assert.deepEqual(fired, ['new'])
  })
})
