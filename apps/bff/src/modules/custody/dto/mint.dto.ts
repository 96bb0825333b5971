export class MintAssetDto {
  to!: string;
  assetId!: string;
}

export class MintTokensDto {
  to!: string;
  amount!: string;
}
