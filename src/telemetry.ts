/*
 * Application Insights telemetry initialization.
 * Starts the SDK only when APPLICATIONINSIGHTS_CONNECTION_STRING is set; otherwise every call is a no-op,
 * which is the normal mode for tests and local runs.
 */
import appInsights from 'applicationinsights'
import type { MapErrorCode } from './mapResult.js'
import { isMapEventName, type MapEventName } from './telemetryEvents.js'

if (!appInsights.defaultClient) {
    const connectionString = process.env.APPLICATIONINSIGHTS_CONNECTION_STRING
    if (connectionString) {
        appInsights
            .setup(connectionString)
            .setAutoCollectRequests(false)
            .setAutoCollectDependencies(false)
            .setAutoCollectExceptions(true)
            .setAutoCollectConsole(false)
            .setSendLiveMetrics(false)
            .start()
    }
}

interface AppInsightsClient {
    trackEvent(args: { name: string; properties?: Record<string, unknown> }): void
    trackException(args: { exception: Error; properties?: Record<string, unknown> }): void
}

const noopClient: AppInsightsClient = {
    trackEvent() {
        /* noop */
    },
    trackException() {
        /* noop */
    }
}

export const telemetryClient: AppInsightsClient = appInsights.defaultClient ?? noopClient

export function trackEvent(name: string, properties?: Record<string, unknown>) {
    telemetryClient.trackEvent({ name, properties })
}

export function trackException(error: Error, properties?: Record<string, unknown>) {
    telemetryClient.trackException({ exception: error, properties })
}

export interface EventPayloadMap {
    'Map.Update.Completed': { roomsVisited: number; openBorders: number; exitBorders: number }
    'Map.Display.Rendered': { rows: number; columns: number }
    'Map.Operation.Failed': { operation: string; code: MapErrorCode; message: string }
    'Labyrinth.Layout.Loaded': { xSize: number; ySize: number; source: string }
    'Labyrinth.Layout.Rejected': { source: string; issues: number; message: string }
    'Telemetry.EventName.Invalid': { requested: string }
}

/** Typed event sink. Injected into the map so tests can observe what it reports. */
export interface MapTelemetry {
    trackMapEvent<E extends MapEventName>(name: E, properties: EventPayloadMap[E]): void
}

export function trackMapEvent<E extends MapEventName>(name: E, properties: EventPayloadMap[E]) {
    if (!isMapEventName(name)) {
        trackEvent('Telemetry.EventName.Invalid', { requested: name })
        return
    }
    trackEvent(name, { ...properties, service: process.env.LABYRINTH_SERVICE_NAME || 'labyrinth-map' })
}

export const defaultMapTelemetry: MapTelemetry = { trackMapEvent }
