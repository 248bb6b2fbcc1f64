declare const brand: unique symbol

/** Nominal wrapper so a JobId cannot be passed where a SubmissionKey is expected. */
export type Brand<T, B extends string> = T & { readonly [brand]: B }
