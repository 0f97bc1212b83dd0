/** A device as listed by the external device registry. */
export interface Device {
  readonly id: string;
  readonly enabled: boolean;
  readonly name?: string | undefined;
  readonly description?: string | undefined;
  readonly sensors?: readonly string[] | undefined;
}
