export interface IVoicemailCall {
  callId: string;
  /** Number actually dialed, E.164. */
  phone: string;
}
