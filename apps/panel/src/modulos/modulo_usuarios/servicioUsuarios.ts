/**
 * Listado de usuarios para administradores.
 */
import { z } from 'zod';
import type { ErrorApi } from '../../compartido/errores/tiposError';
import type { Resultado } from '../../compartido/resultado';
import { esquemaIdRemoto } from '../../compartido/tipos/dominio';
import type { ClienteApi } from '../../servicios_api/clienteApi';
import { decodificarLista } from '../../servicios_api/decodificacionEntidades';

export const esquemaUsuarioRemoto = z
  .object({
    id: esquemaIdRemoto,
    nombre: z.string().optional().catch(undefined),
    correo: z.string().optional().catch(undefined),
    rol: z.string().optional().catch(undefined)
  })
  .passthrough();

export type Usuario = z.output<typeof esquemaUsuarioRemoto>;

export function crearServicioUsuarios(cliente: ClienteApi) {
  async function listar(): Promise<Resultado<Usuario[], ErrorApi>> {
    const respuesta = await cliente.solicitar('GET', { nombre: 'usuarios' });
    if (!respuesta.ok) return respuesta;
    return decodificarLista(esquemaUsuarioRemoto, respuesta.valor, cliente.registrar, 'usuarios');
  }

  return { listar };
}

export type ServicioUsuarios = ReturnType<typeof crearServicioUsuarios>;
