/**
 * Validaciones de preguntas y opciones.
 */
import { z } from 'zod';
import { esquemaIdRemoto, esquemaTipoPregunta } from '../../compartido/tipos/dominio';

export const MINIMO_OPCIONES = 2;
export const MAXIMO_OPCIONES = 6;

const textoPreguntaRequerido = z.string().trim().min(1, 'El texto de la pregunta es obligatorio');
const puntos = z.number().int().positive('Los puntos deben ser un entero positivo').default(1);

const esquemaOpcionNueva = z.object({
  texto: z.string().trim().min(1, 'Cada opcion requiere texto')
});

export const esquemaPreguntaNueva = z.discriminatedUnion('tipoPregunta', [
  z.object({
    tipoPregunta: z.literal('SELECCION_UNICA'),
    textoPregunta: textoPreguntaRequerido,
    puntos,
    opciones: z
      .array(esquemaOpcionNueva)
      .min(MINIMO_OPCIONES, `Se requieren al menos ${MINIMO_OPCIONES} opciones`)
      .max(MAXIMO_OPCIONES, `Se permiten a lo mas ${MAXIMO_OPCIONES} opciones`)
  }),
  z.object({
    tipoPregunta: z.literal('TEXTO_ABIERTO'),
    textoPregunta: textoPreguntaRequerido,
    puntos
  })
]);

export const codigosValidacionPregunta: Record<string, string> = {
  tipoPregunta: 'TIPO_PREGUNTA_INVALIDO',
  textoPregunta: 'TEXTO_PREGUNTA_REQUERIDO',
  puntos: 'PUNTOS_INVALIDOS',
  opciones: 'OPCIONES_INVALIDAS'
};

/** Pregunta tal como se captura en un formulario, antes de validarse. */
export const esquemaBorradorPregunta = z.object({
  textoPregunta: z.string(),
  tipoPregunta: z.string(),
  puntos: z.number().optional(),
  opciones: z.array(z.object({ texto: z.string() })).optional()
});

export type BorradorPregunta = z.infer<typeof esquemaBorradorPregunta>;

const esquemaOpcionRemota = z
  .object({
    id: esquemaIdRemoto,
    texto: z.string().optional(),
    textoPregunta: z.string().optional(),
    esCorrecta: z.boolean().catch(false)
  })
  .transform(({ id, texto, textoPregunta, esCorrecta }) => ({
    id,
    texto: texto ?? textoPregunta ?? '',
    esCorrecta
  }));

/**
 * Pregunta tal como la devuelve el backend. El tipo puede llegar como
 * `tipoPregunta` o `tipo`, y el texto de cada opcion como `texto` o
 * `textoPregunta`.
 */
export const esquemaPreguntaRemota = z
  .object({
    id: esquemaIdRemoto,
    examenId: esquemaIdRemoto.optional().catch(undefined),
    textoPregunta: z.string(),
    tipoPregunta: esquemaTipoPregunta.optional(),
    tipo: esquemaTipoPregunta.optional(),
    puntos: z.coerce.number().int().positive().catch(1),
    opciones: z.array(esquemaOpcionRemota).nullish()
  })
  .transform((pregunta, ctx) => {
    const tipoPregunta = pregunta.tipoPregunta ?? pregunta.tipo;
    if (!tipoPregunta) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, message: 'Tipo de pregunta ausente', path: ['tipoPregunta'] });
      return z.NEVER;
    }
    return {
      id: pregunta.id,
      examenId: pregunta.examenId,
      textoPregunta: pregunta.textoPregunta,
      tipoPregunta,
      puntos: pregunta.puntos,
      opciones: pregunta.opciones ?? []
    };
  });

export type Pregunta = z.output<typeof esquemaPreguntaRemota>;
export type Opcion = Pregunta['opciones'][number];
