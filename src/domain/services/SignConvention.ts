export type BookingDirection = 'DEBIT' | 'CREDIT';

/** Maps a booking category to the side of the account it hits. Keys match case-insensitively. */
export interface SignConvention {
  directions: Readonly<Record<string, BookingDirection>>;
}

export const DEFAULT_SIGN_CONVENTION: SignConvention = {
  directions: {
    Wertpapierkauf: 'DEBIT',
    Wertpapierverkauf: 'CREDIT',
    'Überweisung ausgehend': 'DEBIT',
    'Überweisung eingehend': 'CREDIT',
    Gutschrift: 'CREDIT',
    Lastschrift: 'DEBIT',
    Depotentgelt: 'DEBIT',
    Entgeltabrechnung: 'DEBIT',
    Verwahrentgelt: 'DEBIT',
    Eingang: 'CREDIT',
    Ausgang: 'DEBIT',
  },
};

export const resolveDirection = (convention: SignConvention, category: string): BookingDirection | null => {
  const wanted = category.trim().toLowerCase();
  const entry = Object.entries(convention.directions).find(([key]) => key.toLowerCase() === wanted);
  return entry ? entry[1] : null;
};
