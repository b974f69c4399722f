/**
 * Connection lifecycle as a closed union plus a pure transition function.
 *
 *   connecting ──open──▶ open ──drop──▶ reconnecting ──open──▶ open …
 *       │                  │                 │  ▲
 *       │                  │                 └──┘ fail (attempt + 1)
 *       └──fail / close────┴─────close───────┴──give_up / close──▶ closed
 *
 * `closed` is terminal. Events that make no sense in the current state
 * return the state unchanged.
 */

export type CloseReason = "caller" | "handshake_failed" | "gave_up";

export type ConnectionState =
	| { readonly status: "connecting" }
	| { readonly status: "open"; readonly since: number }
	| { readonly status: "reconnecting"; readonly attempt: number; readonly backoffMs: number }
	| { readonly status: "closed"; readonly reason: CloseReason };

export type ConnectionStatus = ConnectionState["status"];

export type ConnectionEvent =
	/** Handshake succeeded. */
	| { readonly type: "open"; readonly at: number }
	/** Handshake failed; `backoffMs` is the wait before the next attempt. */
	| { readonly type: "fail"; readonly backoffMs: number }
	/** An open socket was lost or retired. */
	| { readonly type: "drop"; readonly backoffMs: number }
	| { readonly type: "give_up" }
	| { readonly type: "close" };

export const INITIAL_STATE: ConnectionState = { status: "connecting" };

export function transition(state: ConnectionState, event: ConnectionEvent): ConnectionState {
	if (state.status === "closed") return state;
	if (event.type === "close") return { status: "closed", reason: "caller" };

	switch (state.status) {
		case "connecting":
			if (event.type === "open") return { status: "open", since: event.at };
			if (event.type === "fail") return { status: "closed", reason: "handshake_failed" };
			return state;
		case "open":
			if (event.type === "drop") {
				return { status: "reconnecting", attempt: 1, backoffMs: event.backoffMs };
			}
			return state;
		case "reconnecting":
			if (event.type === "open") return { status: "open", since: event.at };
			if (event.type === "fail") {
				return { status: "reconnecting", attempt: state.attempt + 1, backoffMs: event.backoffMs };
			}
			if (event.type === "give_up") return { status: "closed", reason: "gave_up" };
			return state;
	}
}

export function isLive(state: ConnectionState): boolean {
	return state.status !== "closed";
}
