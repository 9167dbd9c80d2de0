/**
 * Marker for an event that has already happened.
 * Notifications carry no response and may be handled by any number of handlers.
 */
export interface INotification {}
