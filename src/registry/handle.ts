/**
 * Minimal registry interface a handle revokes itself through.
 * Avoids coupling ListenerHandle to the full EventRegistry.
 */
export interface HandleOwner {
	unregister(handle: ListenerHandle): boolean;
}

/** Handles whose registration has been removed. Only the registry adds to it. */
const revokedHandles = new WeakSet<ListenerHandle>();

/**
 * Marks a handle as revoked. Called by the registry when the handle's record
 * leaves the listener sequence, whatever the reason.
 *
 * @param handle - The handle whose record was removed
 * @returns true if the handle was live until now
 */
export function markRevoked(handle: ListenerHandle): boolean {
	if (revokedHandles.has(handle)) {
		return false;
	}
	revokedHandles.add(handle);
	return true;
}

/**
 * Opaque, revocable token for one listener registration.
 *
 * The handle only weakly references the registry that issued it, so holding
 * a handle never keeps a discarded emitter alive.
 */
export class ListenerHandle {
	/** Event the listener is registered for. */
	readonly event: string;
	/** Registry-wide registration number, increasing in registration order. */
	readonly id: number;
	/** Whether the registration is consumed by its first invocation. */
	readonly once: boolean;
	/** Dispatch priority, higher first. */
	readonly priority: number;
	readonly #owner: WeakRef<HandleOwner>;

	/**
	 * @param owner - Registry that issued the handle
	 * @param registration - Identity and options of the registration
	 */
	constructor(owner: HandleOwner, registration: { event: string; id: number; once: boolean; priority: number }) {
		this.#owner = new WeakRef(owner);
		this.event = registration.event;
		this.id = registration.id;
		this.once = registration.once;
		this.priority = registration.priority;
	}

	/** false once the registration has been removed, consumed or cleared. */
	get active(): boolean {
		return !revokedHandles.has(this);
	}

	/**
	 * Removes the registration. Revoking an inactive handle is a no-op.
	 *
	 * @returns true if this call removed the registration
	 */
	revoke(): boolean {
		if (!this.active) {
			return false;
		}
		return this.#owner.deref()?.unregister(this) ?? false;
	}
}
