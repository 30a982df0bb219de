export enum BoundaryHit {
  None = 'none',
  Floor = 'floor',
  Cap = 'cap',
}

export enum RateUnit {
  Percent = 'percent',
  Decimal = 'decimal',
}

export enum TenorUnit {
  Day = 'D',
  Week = 'W',
  Month = 'M',
  Year = 'Y',
}
