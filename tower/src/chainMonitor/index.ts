/* This Source Code Form is subject to the terms of the Mozilla Public
 * License, v. 2.0. If a copy of the MPL was not distributed with this
 * file, You can obtain one at https://mozilla.org/MPL/2.0/. */
export * from './bootstrapReconciler'
export * from './chainMonitor'
export * from './errors'
export * from './lifecycle'
export * from './notifier'
export * from './pendingQueue'
export * from './pollDetector'
export * from './pushDetector'
export * from './stateTracker'
export * from './types'
