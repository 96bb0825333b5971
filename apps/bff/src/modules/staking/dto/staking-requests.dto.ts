export class StakeRequestDto {
  assetId!: string;
}

export class ExitRequestDto {
  forceWithTax?: boolean | string;
}

export class AmountSettingDto {
  amount!: string | number;
}

export class CountSettingDto {
  value!: string | number;
}

export class HoursSettingDto {
  hours!: string | number;
}
