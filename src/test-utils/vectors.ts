/**
 * Known-answer vectors
 *
 * Ed25519 vectors: the first four entries of the cr.yp.to sign.input corpus
 * (the first three are RFC 8032 section 7.1 tests 1-3), RFC 8032 test
 * SHA(abc) with a 64-byte message, and a 96-byte ASCII message under a
 * counting seed. X25519 vectors are from RFC 7748 sections 5.2 and 6.1.
 */

export interface SignVector {
  readonly secretKey: string;
  readonly publicKey: string;
  readonly message: string;
  readonly signature: string;
}

export const SIGN_VECTORS: readonly SignVector[] = [
  {
    secretKey: '9d61b19deffd5a60ba844af492ec2cc44449c5697b326919703bac031cae7f60',
    publicKey: 'd75a980182b10ab7d54bfed3c964073a0ee172f3daa62325af021a68f707511a',
    message: '',
    signature:
      'e5564300c360ac729086e2cc806e828a84877f1eb8e5d974d873e065224901555fb8821590a33bacc61e39701cf9b46bd25bf5f0595bbe24655141438e7a100b',
  },
  {
    secretKey: '4ccd089b28ff96da9db6c346ec114e0f5b8a319f35aba624da8cf6ed4fb8a6fb',
    publicKey: '3d4017c3e843895a92b70aa74d1b7ebc9c982ccf2ec4968cc0cd55f12af4660c',
    message: '72',
    signature:
      '92a009a9f0d4cab8720e820b5f642540a2b27b5416503f8fb3762223ebdb69da085ac1e43e15996e458f3613d0f11d8c387b2eaeb4302aeeb00d291612bb0c00',
  },
  {
    secretKey: 'c5aa8df43f9f837bedb7442f31dcb7b166d38535076f094b85ce3a2e0b4458f7',
    publicKey: 'fc51cd8e6218a1a38da47ed00230f0580816ed13ba3303ac5deb911548908025',
    message: 'af82',
    signature:
      '6291d657deec24024827e69c3abe01a30ce548a284743a445e3680d7db5ac3ac18ff9b538d16f290ae67f760984dc6594a7c15e9716ed28dc027beceea1ec40a',
  },
  {
    secretKey: '0d4a05b07352a5436e180356da0ae6efa0345ff7fb1572575772e8005ed978e9',
    publicKey: 'e61a185bcef2613a6c7cb79763ce945d3b245d76114dd440bcf5f2dc1aa57057',
    message: 'cbc77b',
    signature:
      'd9868d52c2bebce5f3fa5a79891970f309cb6591e3e1702a70276fa97c24b3a8e58606c38c9758529da50ee31b8219cba45271c689afa60b0ea26c99db19b00c',
  },
  {
    secretKey: '833fe62409237b9d62ec77587520911e9a759cec1d19755b7da901b96dca3d42',
    publicKey: 'ec172b93ad5e563bf4932c70e1245034c35467ef2efd4d64ebf819683467e2bf',
    message:
      'ddaf35a193617abacc417349ae20413112e6fa4e89a97ea20a9eeee64b55d39a2192992a274fc1a836ba3c23a3feebbd454d4423643ce80e2a9ac94fa54ca49f',
    signature:
      'dc2a4459e7369633a52b1bf277839a00201009a3efbf3ecb69bea2186c26b58909351fc9ac90b3ecfdfbc7c66431e0303dca179c138ac17ad9bef1177331a704',
  },
  {
    secretKey: '0102030405060708090a0b0c0d0e0f101112131415161718191a1b1c1d1e1f20',
    publicKey: '79b5562e8fe654f94078b112e8a98ba7901f853ae695bed7e0e3910bad049664',
    message:
      '54686520717569636b2062726f776e20666f78206a756d7073206f76657220746865206c617a7920646f67207768696c6520746865207369676e6572206861736865732065766572792062797465206f6620746869732073656e74656e63652e',
    signature:
      '5b71305fa23e19b0618d14c81bd3c0c5cfd8b2b820552872672472322d629b0769438e34fa11a86c938d203a600b1fa92115bb4fa1a36183c444ca9530cfb301',
  },
];

/**
 * Ed25519 → Curve25519 conversion vector
 */
export const CONVERSION_VECTOR = {
  secretKey: 'f43e30c8b167e486d8354701697f2ed238261172ab53521d6a733ab2edd50ae2',
  curveSecretKey: 'd04b301d42d453f5283313d596d84160a5ceff8cb30ad75c869b1e50e568684c',
  publicKey: '4637aa90bd31dca7e271960f358a9c27e6d34dc364ae7070cc099a13a5468550',
  curvePublicKey: '4691577ca17d1774b4792c1e29ce2b58f14b68410cd7697b3ee2e47c6a6f2730',
} as const;

export const X25519_VECTORS = {
  scalar: 'a546e36bf0527c9d3b16154b82465edd62144c0ac1fc5a18506a2244ba449ac4',
  u: 'e6db6867583030db3594c1a424b15f7c726624ec26b3353b10a903a6d0ab1c4c',
  output: 'c3da55379de9c6908e94ea4df28d084f32eccf03491c71f754b4075577a28552',
  alicePrivate: '77076d0a7318a57d3c16c17251b26645df4c2f87ebc0992ab177fba51db92c2a',
  alicePublic: '8520f0098930a754748b7ddcb43ef75a0dbf3a0d26381af4eba4a98eaa9b4e6a',
  bobPrivate: '5dab087e624a8a4b79e17f8b83800ee66f3bb1292618b6fd1c2f8b27ff88e0eb',
  bobPublic: 'de9edb7d7b7dc1b4d35b61c2ece435373f8343c85b78674dadfc7e146f882b4f',
  sharedSecret: '4a5d9d5ba4ce2de1728e3bf480350f25e07e21c947d19e3376f09b3c1e161742',
} as const;
