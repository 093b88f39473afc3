declare module "llama-tokenizer-js" {
  interface LlamaTokenizer {
    encode(
      prompt: string,
      addBosToken?: boolean,
      addPrecedingSpace?: boolean,
      logPerformance?: boolean
    ): number[]
    decode(tokenIds: number[], addBosToken?: boolean, addPrecedingSpace?: boolean): string
  }

  const llamaTokenizer: LlamaTokenizer
  export default llamaTokenizer
}
