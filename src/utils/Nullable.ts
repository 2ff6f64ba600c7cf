export type Nullable<A> = A | undefined;
