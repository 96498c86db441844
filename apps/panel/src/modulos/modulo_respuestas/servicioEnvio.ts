/**
 * Envio de respuestas de un examen al backend.
 */
import type { ErrorApi, ErrorEnsamblado } from '../../compartido/errores/tiposError';
import { exito } from '../../compartido/resultado';
import type { Resultado } from '../../compartido/resultado';
import type { ClienteApi } from '../../servicios_api/clienteApi';
import { construirEnvio } from './ensambladorEnvio';
import type { EnvioRespuestas, PreguntaResoluble, SesionRespuestas } from './ensambladorEnvio';

export function crearServicioEnvio(cliente: ClienteApi) {
  /**
   * Arma el envio y lo publica. La sesion pasa a ENVIADA solo con HTTP 201;
   * ante cualquier otro resultado conserva sus respuestas para reintentar.
   */
  async function enviarRespuestas(
    sesion: SesionRespuestas,
    preguntas: readonly PreguntaResoluble[]
  ): Promise<Resultado<EnvioRespuestas, ErrorApi | ErrorEnsamblado>> {
    if (sesion.estado() === 'ENVIADA') {
      throw new Error(`La sesion del examen ${sesion.examenId} ya fue enviada`);
    }

    const envio = construirEnvio(sesion.examenId, sesion.instantanea(), preguntas);
    if (!envio.ok) return envio;

    const respuesta = await cliente.solicitar(
      'POST',
      { nombre: 'resultados' },
      { cuerpo: envio.valor, estadoEsperado: 201, esperaCuerpo: false }
    );
    if (!respuesta.ok) return respuesta;

    sesion.marcarEnviada();
    cliente.registrar('ok', 'Examen enviado', { examenId: sesion.examenId });
    return exito(envio.valor);
  }

  return { enviarRespuestas };
}

export type ServicioEnvio = ReturnType<typeof crearServicioEnvio>;
