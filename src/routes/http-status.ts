/** Coordinator responses with `status: "error"` map to 500. */
export const httpStatus = (status: string, successCode = 200) => (status === "error" ? 500 : successCode);
